import type { ClientAuthenticationToken, UserAttributes } from "../types.js";

/**
 * Fetches the End-User's attributes from the provider's UserInfo endpoint.
 * Implementations reject when no attributes can be produced; the user
 * service reports any rejection as a failed login.
 */
export interface UserInfoRetriever {
  retrieve(token: ClientAuthenticationToken): Promise<UserAttributes>;
}
