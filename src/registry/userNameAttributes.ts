import { ConfigurationError } from "../errors/error.js";
import type { UserNameAttributes } from "../types.js";

export interface UserNameAttributeRegistry {
  readonly size: number;
  lookup(userInfoUri: string): string | undefined;
  entries(): IterableIterator<[string, string]>;
}

function isEntryIterable(
  x: UserNameAttributes,
): x is Iterable<readonly [string, string]> {
  return Symbol.iterator in x;
}

/**
 * URL-shaped values compare on their WHATWG `href` (lower-cased scheme/host,
 * default port dropped); anything else compares on the trimmed string.
 */
export function normalizeEndpointUri(uri: string): string {
  const trimmed = uri.trim();
  try {
    return new URL(trimmed).href;
  } catch {
    return trimmed;
  }
}

export function createUserNameAttributeRegistry(
  mapping: UserNameAttributes,
): UserNameAttributeRegistry {
  const source = isEntryIterable(mapping) ? mapping : Object.entries(mapping);

  const names = new Map<string, string>();
  for (const [uri, attributeName] of source) {
    names.set(normalizeEndpointUri(uri), attributeName);
  }

  if (names.size === 0) {
    throw new ConfigurationError("userNameAttributes cannot be empty");
  }

  return Object.freeze({
    size: names.size,
    lookup(userInfoUri: string) {
      return names.get(normalizeEndpointUri(userInfoUri));
    },
    entries() {
      return new Map(names).entries();
    },
  });
}
