import { createOAuth2UserService } from "../../src/userService.js";
import { loadUserNameAttributesFromEnv } from "../../src/config.js";
import { createLogger } from "../../src/logging.js";
import { FetchUserInfoRetriever } from "../../src/retriever/fetchUserInfoRetriever.js";
import { getUserName } from "../../src/user/oauth2User.js";

// Example env:
//   OAUTH2_USER_NAME_ATTRIBUTES='{"https://api.github.com/user":"login"}'
//   USERINFO_URI=https://api.github.com/user
const logger = createLogger();

const userService = createOAuth2UserService(
  {
    userNameAttributes: loadUserNameAttributesFromEnv(),
    logger,
  },
  {
    userInfoRetriever: new FetchUserInfoRetriever({ timeoutMs: 5000, logger }),
  },
);

async function main() {
  const accessToken = process.argv[2];
  const userInfoUri = process.env.USERINFO_URI;
  if (!accessToken || !userInfoUri) {
    console.error(
      'Usage: USERINFO_URI=<uri> node dist/examples/userinfo-login/index.js "<ACCESS_TOKEN>"',
    );
    process.exit(1);
  }

  const result = await userService.loadUser({
    kind: "oauth2",
    clientRegistration: {
      registrationId: "example",
      clientId: process.env.OAUTH2_CLIENT_ID ?? "example-client",
      providerDetails: { userInfoEndpoint: { uri: userInfoUri } },
    },
    accessToken: { tokenValue: accessToken, tokenType: "Bearer" },
  });

  if (!result.ok) {
    console.error("❌ Login failed:", result.error);
    process.exit(1);
  }
  if (!result.user) {
    console.log("Token belongs to the OIDC flow");
    return;
  }

  console.log("✅ Logged in");
  console.log("name:", getUserName(result.user));
  console.log("nameAttributeKey:", result.user.nameAttributeKey);
  console.log("attributes:", result.user.attributes);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
