export { createTallybookExpress } from "./express.js";
export { createTallybookFetchHandler } from "./fetch.js";
export type { ApiHandlerOptions, ApiRequest, ApiResponse } from "./handler.js";
export { handleRequest } from "./handler.js";
export type { Route } from "./route.js";
export {
	serializeAccount,
	serializeEntry,
	serializeStatement,
	serializeTransfer,
} from "./serializers.js";
