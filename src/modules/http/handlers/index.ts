/**
 * HTTP Handlers
 */

export { handleChatCompletions, isChatCompletionRequest } from './chat-completions.handler';
export { handleModels } from './models.handler';
export { handleHealth } from './health.handler';
export { handleHttpError, handleNotFound, sendError, errorBody, ErrorType } from './error.handler';
