import type { Logger } from "pino";
import type { AuthError } from "./errors/error.js";
import type { UserInfoRetriever } from "./retriever/types.js";
import type { OAuth2User } from "./user/oauth2User.js";

export type UserInfoAuthenticationMethod = "header" | "form" | "query";

export type ClientRegistration = {
  registrationId: string;
  clientId: string;
  providerDetails: {
    userInfoEndpoint: {
      uri: string;
      authenticationMethod?: UserInfoAuthenticationMethod; // default "header"
    };
    jwkSetUri?: string; // needed only for application/jwt UserInfo responses
  };
};

export type OAuth2AccessToken = {
  tokenValue: string;
  tokenType: "Bearer";
  issuedAt?: Date;
  expiresAt?: Date;
  scopes?: string[];
};

/**
 * Result of a completed authorization exchange.
 * `kind` decides which user service handles it; "oidc" belongs to the
 * OpenID Connect path and is never resolved here.
 */
export type ClientAuthenticationToken =
  | {
      kind: "oauth2";
      clientRegistration: ClientRegistration;
      accessToken: OAuth2AccessToken;
    }
  | {
      kind: "oidc";
      clientRegistration: ClientRegistration;
      accessToken: OAuth2AccessToken;
      idToken: string;
    };

export type UserAttributes = Record<string, unknown>;

export type UserNameAttributes =
  | Record<string, string>
  | ReadonlyMap<string, string>
  | Iterable<readonly [string, string]>;

export type OAuth2UserServiceConfig = {
  /** UserInfo endpoint URI -> attribute carrying the user's name. */
  userNameAttributes: UserNameAttributes;
  logger?: Logger;
};

export type OAuth2UserServiceAdapters = {
  userInfoRetriever?: UserInfoRetriever;
};

export type LoadUserResult =
  | {
      ok: true;
      user: OAuth2User;
    }
  | {
      // token handled by another user service (OIDC)
      ok: true;
      user: null;
    }
  | {
      ok: false;
      error: AuthError;
    };

export interface OAuth2UserService {
  loadUser(token: ClientAuthenticationToken): Promise<LoadUserResult>;
}
