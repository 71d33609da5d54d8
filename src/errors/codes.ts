export type AuthErrorCode =
  | "AUTH_CONFIG_ERROR" // missing/invalid deployment-time configuration
  | "AUTH_USERINFO_FAILED"; // UserInfo endpoint could not produce attributes
