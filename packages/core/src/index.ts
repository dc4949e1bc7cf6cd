export * from './types/index.js';
export {
  CloudAIError,
  classifyStatus,
  isCloudAIError,
  DEFAULT_ERROR_MESSAGES,
  type CloudAIErrorKind,
  type CloudAIErrorOptions,
} from './errors.js';
export {
  createClientConfig,
  clientOptionsFromEnv,
  authHeader,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  CLIENT_SOURCE,
  CLIENT_SOURCE_HEADER,
  type ClientConfig,
  type ClientOptions,
} from './client/config.js';
export {
  createFetchTransport,
  type Transport,
  type TransportRequest,
  type TransportResponse,
  type HttpMethod,
} from './client/transport.js';
export { dispatch, dispatchText, dispatchEmpty, type DispatchRequest } from './client/dispatcher.js';
export { encodeQuery, buildUrl } from './client/query-string.js';
export { CloudAIClient } from './client/cloud-ai-client.js';
export {
  encodeContentItem,
  decodeContentItem,
  encodeChatContent,
  decodeChatContent,
} from './codec/content-codec.js';
export {
  encodeChatMessage,
  decodeChatMessage,
  decodeUsage,
  decodeAgentCallResponse,
  decodeChatCompletionResponse,
  decodeTextCompletionResponse,
  decodeModelsResponse,
  decodeConversation,
  decodeConversationDeleted,
  decodeConversationItem,
  decodeConversationItemList,
  decodeResponse,
  type Decoder,
} from './codec/decoders.js';
export {
  callAgent,
  chatCompletions,
  textCompletions,
  listModels,
  getEmbedCode,
  type EmbedCodeOptions,
} from './api/agents.js';
export {
  createConversation,
  getConversation,
  updateConversation,
  deleteConversation,
  listConversationItems,
  createConversationItems,
  getConversationItem,
  deleteConversationItem,
  nextItemsPage,
} from './api/conversations.js';
export {
  createResponse,
  getResponse,
  deleteResponse,
  cancelResponse,
  throwIfCancelled,
} from './api/responses.js';
export { accumulateUsage, emptyUsage, isUsageConsistent } from './utils/tokens.js';
export { generateRequestId } from './utils/ids.js';
