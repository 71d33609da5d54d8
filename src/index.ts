export { createOAuth2UserService } from "./userService.js";

export * from "./types.js";
export * from "./errors/codes.js";
export * from "./errors/error.js";

export * from "./registry/userNameAttributes.js";
export * from "./retriever/types.js";
export * from "./retriever/fetchUserInfoRetriever.js";
export * from "./user/oauth2User.js";

export * from "./config.js";
export * from "./logging.js";
