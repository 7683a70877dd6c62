export {
  AdvisorSpec,
  CallResponse,
  ChatClient,
  ChatClientBuilder,
  type ChatClientConfig,
  createChatClient,
  PromptSpec,
  StreamResponse,
} from "./chatClient";
