import type { UserAttributes } from "../types.js";

export type OAuth2UserAuthority = {
  type: "OAUTH2_USER";
  authority: "ROLE_USER";
  attributes: Readonly<UserAttributes>;
};

// Only one variant today; kept as a union so other authority kinds can join.
export type GrantedAuthority = OAuth2UserAuthority;

export type OAuth2User = {
  authorities: ReadonlySet<GrantedAuthority>;
  attributes: Readonly<UserAttributes>;
  nameAttributeKey: string;
};

export function createOAuth2UserAuthority(
  attributes: UserAttributes,
): OAuth2UserAuthority {
  return Object.freeze({
    type: "OAUTH2_USER",
    authority: "ROLE_USER",
    attributes: Object.freeze({ ...attributes }),
  });
}

/**
 * Structural assembly only: the caller decides that `nameAttributeKey`
 * is the right key for these attributes.
 */
export function createOAuth2User(
  authorities: Iterable<GrantedAuthority>,
  attributes: UserAttributes,
  nameAttributeKey: string,
): OAuth2User {
  return Object.freeze({
    authorities: new Set(authorities),
    attributes: Object.freeze({ ...attributes }),
    nameAttributeKey,
  });
}

export function getUserName(user: OAuth2User): string | undefined {
  if (!Object.hasOwn(user.attributes, user.nameAttributeKey)) {
    return undefined;
  }
  const value = user.attributes[user.nameAttributeKey];
  if (value === undefined || value === null) return undefined;
  return typeof value === "string" ? value : String(value);
}
