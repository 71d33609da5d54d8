import type {
  ClientAuthenticationToken,
  LoadUserResult,
  OAuth2UserService,
  OAuth2UserServiceAdapters,
  OAuth2UserServiceConfig,
  UserAttributes,
} from "./types.js";
import {
  ConfigurationError,
  err,
  UserInfoRetrievalError,
} from "./errors/error.js";
import { createLogger } from "./logging.js";
import { createUserNameAttributeRegistry } from "./registry/userNameAttributes.js";
import { FetchUserInfoRetriever } from "./retriever/fetchUserInfoRetriever.js";
import {
  createOAuth2User,
  createOAuth2UserAuthority,
} from "./user/oauth2User.js";

function mapRetrievalFailure(e: unknown, userInfoUri: string) {
  if (e instanceof UserInfoRetrievalError) {
    return err("AUTH_USERINFO_FAILED", e.message, {
      ...e.details,
      userInfoUri,
      reason: e.reason,
      ...(e.status !== undefined ? { status: e.status } : {}),
    });
  }
  const msg = e instanceof Error ? e.message : String(e);
  return err(
    "AUTH_USERINFO_FAILED",
    "An error occurred while retrieving the UserInfo attributes",
    { userInfoUri, cause: msg },
  );
}

/**
 * User service for plain OAuth 2.0 providers.
 *
 * UserInfo attribute names are not standardized, so each provider's
 * "user name" attribute has to be configured up front, keyed by its UserInfo
 * endpoint URI. Tokens from the OpenID Connect flow are left to the OIDC
 * user service: `loadUser` answers them with `{ ok: true, user: null }`.
 */
export function createOAuth2UserService(
  config: OAuth2UserServiceConfig,
  adapters: OAuth2UserServiceAdapters = {},
): OAuth2UserService {
  if (!config?.userNameAttributes) {
    throw new ConfigurationError(
      "OAuth2UserServiceConfig.userNameAttributes is required",
    );
  }

  const registry = createUserNameAttributeRegistry(config.userNameAttributes);
  const rootLogger = config.logger ?? createLogger();
  const logger = rootLogger.child({ component: "oauth2-user-service" });
  const retriever =
    adapters.userInfoRetriever ??
    new FetchUserInfoRetriever({ logger: rootLogger });

  function delegatesElsewhere(token: ClientAuthenticationToken) {
    switch (token.kind) {
      case "oidc":
        return true;
      case "oauth2":
        return false;
    }
  }

  async function loadUser(
    token: ClientAuthenticationToken,
  ): Promise<LoadUserResult> {
    if (delegatesElsewhere(token)) {
      logger.debug(
        { registrationId: token.clientRegistration.registrationId },
        "OIDC token left to the OIDC user service",
      );
      return { ok: true, user: null };
    }

    const userInfoUri =
      token.clientRegistration.providerDetails.userInfoEndpoint.uri;
    const userNameAttributeName = registry.lookup(userInfoUri);
    if (userNameAttributeName === undefined) {
      logger.error(
        {
          registrationId: token.clientRegistration.registrationId,
          userInfoUri,
        },
        "No user name attribute configured for UserInfo endpoint",
      );
      return {
        ok: false,
        error: err(
          "AUTH_CONFIG_ERROR",
          `Missing required "user name" attribute name for UserInfo Endpoint: ${userInfoUri}`,
          { userInfoUri },
        ),
      };
    }

    let userAttributes: UserAttributes;
    try {
      userAttributes = await retriever.retrieve(token);
    } catch (e) {
      const error = mapRetrievalFailure(e, userInfoUri);
      logger.warn(
        {
          registrationId: token.clientRegistration.registrationId,
          error,
        },
        "UserInfo retrieval failed",
      );
      return { ok: false, error };
    }

    // Not enforced: the identity is still built when the key is absent.
    if (!Object.hasOwn(userAttributes, userNameAttributeName)) {
      logger.warn(
        { userInfoUri, userNameAttributeName },
        "UserInfo response lacks the configured user name attribute",
      );
    }

    const authority = createOAuth2UserAuthority(userAttributes);
    return {
      ok: true,
      user: createOAuth2User([authority], userAttributes, userNameAttributeName),
    };
  }

  return { loadUser };
}
