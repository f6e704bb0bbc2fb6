export { createAllowStage, BODYLESS_METHODS, getContentType, isContentTypeAllowed } from "./allow.ts";
export { createAuthenticateStage } from "./authenticate.ts";
export { createAuthorizeStage } from "./authorize.ts";
