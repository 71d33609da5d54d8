import { createRemoteJWKSet, jwtVerify, type JWTVerifyGetKey } from "jose";
import type { Logger } from "pino";
import { UserInfoRetrievalError } from "../errors/error.js";
import { createLogger } from "../logging.js";
import type { ClientAuthenticationToken, UserAttributes } from "../types.js";
import type { UserInfoRetriever } from "./types.js";

export type FetchUserInfoRetrieverOptions = {
  fetch?: typeof fetch;
  timeoutMs?: number;
  /**
   * Key source for signed (application/jwt) UserInfo responses. When absent
   * the registration's `jwkSetUri` is used.
   */
  jwks?: JWTVerifyGetKey;
  logger?: Logger;
};

function isPlainObject(x: unknown): x is UserAttributes {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// RFC 6750 error fields, when the provider sends a JSON error body
async function readProviderError(
  res: Response,
): Promise<Record<string, unknown>> {
  const body = tryParseJson(await res.text().catch(() => ""));
  if (!isPlainObject(body)) return {};
  return {
    ...(typeof body.error === "string" ? { error: body.error } : {}),
    ...(typeof body.error_description === "string"
      ? { errorDescription: body.error_description }
      : {}),
  };
}

/**
 * Default retriever: calls the UserInfo endpoint with the access token and
 * returns the JSON (or verified JWT) claims verbatim.
 */
export class FetchUserInfoRetriever implements UserInfoRetriever {
  private fetchImpl: typeof fetch;
  private timeoutMs?: number;
  private jwks?: JWTVerifyGetKey;
  private logger: Logger;

  // one remote key set per jwkSetUri
  private remoteKeySets = new Map<string, JWTVerifyGetKey>();

  constructor(options: FetchUserInfoRetrieverOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs;
    this.jwks = options.jwks;
    this.logger = (options.logger ?? createLogger()).child({
      component: "userinfo-retriever",
    });
  }

  private buildRequest(token: ClientAuthenticationToken): {
    url: URL;
    init: RequestInit;
  } {
    const endpoint = token.clientRegistration.providerDetails.userInfoEndpoint;
    const url = new URL(endpoint.uri);
    const headers: Record<string, string> = {
      Accept: "application/json, application/jwt",
    };
    const signal =
      this.timeoutMs !== undefined
        ? AbortSignal.timeout(this.timeoutMs)
        : undefined;
    const tokenValue = token.accessToken.tokenValue;

    switch (endpoint.authenticationMethod ?? "header") {
      case "form":
        headers["Content-Type"] = "application/x-www-form-urlencoded";
        return {
          url,
          init: {
            method: "POST",
            headers,
            body: new URLSearchParams({ access_token: tokenValue }).toString(),
            signal,
          },
        };
      case "query":
        url.searchParams.set("access_token", tokenValue);
        return { url, init: { method: "GET", headers, signal } };
      case "header":
        headers.Authorization = `Bearer ${tokenValue}`;
        return { url, init: { method: "GET", headers, signal } };
    }
  }

  private getKeySet(token: ClientAuthenticationToken): JWTVerifyGetKey {
    if (this.jwks) return this.jwks;

    const jwkSetUri = token.clientRegistration.providerDetails.jwkSetUri;
    if (!jwkSetUri) {
      throw new UserInfoRetrievalError(
        "MALFORMED_RESPONSE",
        "Signed UserInfo response received but no jwkSetUri is configured",
        {
          details: {
            registrationId: token.clientRegistration.registrationId,
          },
        },
      );
    }

    let keySet = this.remoteKeySets.get(jwkSetUri);
    if (!keySet) {
      keySet = createRemoteJWKSet(new URL(jwkSetUri));
      this.remoteKeySets.set(jwkSetUri, keySet);
    }
    return keySet;
  }

  // a body cut off mid-stream (reset, timeout abort) is a transport failure
  private async readBody(res: Response, endpoint: string): Promise<string> {
    try {
      return await res.text();
    } catch (e) {
      this.logger.warn(
        { endpoint, cause: errorMessage(e) },
        "UserInfo response body could not be read",
      );
      throw new UserInfoRetrievalError(
        "NETWORK",
        `UserInfo response from ${endpoint} could not be read: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }

  private async parseSignedResponse(
    body: string,
    token: ClientAuthenticationToken,
  ): Promise<UserAttributes> {
    const keySet = this.getKeySet(token);
    try {
      const { payload } = await jwtVerify(body.trim(), keySet, {
        audience: token.clientRegistration.clientId,
      });
      return { ...payload };
    } catch (e) {
      throw new UserInfoRetrievalError(
        "MALFORMED_RESPONSE",
        `UserInfo JWT could not be verified: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }

  private parseJsonResponse(text: string): UserAttributes {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (e) {
      throw new UserInfoRetrievalError(
        "MALFORMED_RESPONSE",
        "UserInfo response is not valid JSON",
        { cause: e },
      );
    }
    if (!isPlainObject(body)) {
      throw new UserInfoRetrievalError(
        "MALFORMED_RESPONSE",
        "UserInfo response must be a JSON object",
      );
    }
    return body;
  }

  async retrieve(token: ClientAuthenticationToken): Promise<UserAttributes> {
    const { url, init } = this.buildRequest(token);
    const endpoint = `${url.origin}${url.pathname}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, init);
    } catch (e) {
      this.logger.warn(
        { endpoint, cause: errorMessage(e) },
        "UserInfo request failed",
      );
      throw new UserInfoRetrievalError(
        "NETWORK",
        `UserInfo request to ${endpoint} failed: ${errorMessage(e)}`,
        { cause: e },
      );
    }

    if (!res.ok) {
      const providerError = await readProviderError(res);
      this.logger.warn(
        { endpoint, status: res.status, ...providerError },
        "UserInfo endpoint returned an error response",
      );
      throw new UserInfoRetrievalError(
        "HTTP_STATUS",
        `UserInfo endpoint ${endpoint} responded with status ${res.status}`,
        { status: res.status, details: providerError },
      );
    }

    const contentType = res.headers.get("content-type") ?? "";
    const body = await this.readBody(res, endpoint);
    const attributes = contentType.toLowerCase().includes("application/jwt")
      ? await this.parseSignedResponse(body, token)
      : this.parseJsonResponse(body);

    this.logger.debug(
      { endpoint, attributeCount: Object.keys(attributes).length },
      "UserInfo attributes retrieved",
    );
    return attributes;
  }
}
