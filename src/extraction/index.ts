export type {
  ExtractionAgent,
  ExtractionUnit,
  ExtractionCallOptions,
  NerService,
  NerMention,
  ChatClient,
} from "./types.js";
export { ChatClientError, ExtractionError, NerError, ResponseParseError } from "./errors.js";
export { parseJsonArray, stripCodeFence } from "./response-parser.js";
export { renderUnit, buildEntityPrompt, buildRelationPrompt, buildNerPrompt } from "./prompts.js";
export { LlmExtractionAgent } from "./LlmExtractionAgent.js";
export { LlmNerService, locateMentions } from "./LlmNerService.js";
export { OpenAIChatClient, type OpenAIChatClientConfig, type OpenAIChatApi } from "./OpenAIChatClient.js";
