import { createLogger } from "../src/logging.js";
import type {
  ClientAuthenticationToken,
  UserInfoAuthenticationMethod,
} from "../src/types.js";

export const silentLogger = createLogger({ level: "silent" });

export function oauth2Token(
  userInfoUri: string,
  opts: {
    tokenValue?: string;
    authenticationMethod?: UserInfoAuthenticationMethod;
    jwkSetUri?: string;
  } = {},
): ClientAuthenticationToken {
  return {
    kind: "oauth2",
    clientRegistration: {
      registrationId: "test-provider",
      clientId: "test-client",
      providerDetails: {
        userInfoEndpoint: {
          uri: userInfoUri,
          ...(opts.authenticationMethod
            ? { authenticationMethod: opts.authenticationMethod }
            : {}),
        },
        ...(opts.jwkSetUri ? { jwkSetUri: opts.jwkSetUri } : {}),
      },
    },
    accessToken: {
      tokenValue: opts.tokenValue ?? "test-access-token",
      tokenType: "Bearer",
    },
  };
}

export function oidcToken(userInfoUri: string): ClientAuthenticationToken {
  return {
    kind: "oidc",
    clientRegistration: {
      registrationId: "test-oidc-provider",
      clientId: "test-client",
      providerDetails: { userInfoEndpoint: { uri: userInfoUri } },
    },
    accessToken: { tokenValue: "test-access-token", tokenType: "Bearer" },
    idToken: "test-id-token",
  };
}
