export * from './content.js';
export * from './messages.js';
export * from './common.js';
export * from './chat.js';
export * from './conversation.js';
export * from './response.js';
