/**
 * Chat Client
 *
 * Fluent facade that owns default advisors, takes per-call advisor
 * configuration, and runs the advisor chains around one model invocation.
 *
 * @example
 * ```typescript
 * const client = ChatClient.builder(model)
 *   .defaultSystem("Default system text.")
 *   .defaultAdvisors(createPromptChatMemoryAdvisor({ chatMemory }))
 *   .build();
 *
 * const response = await client
 *   .prompt()
 *   .user("my name is John")
 *   .advisors((spec) => spec.param(CHAT_MEMORY_CONVERSATION_ID_KEY, "c-1"))
 *   .call();
 * console.log(response.content());
 * ```
 */

import { createAdvisedRequest, toPrompt } from "../advisors/advisedRequest";
import { AdvisorChain } from "../advisors/advisorChain";
import { type AdvisorContext, createAdvisorContext } from "../advisors/advisorContext";
import { mapStream } from "../advisors/streams";
import type { Advisor } from "../advisors/types";
import { type AdvisorWarning, ConfigurationError, errorMessage, toAdvisorError } from "../errors";
import { type AdvisorLogger, createNoopLogger } from "../logging";
import { contentOf } from "../providers/responses";
import type { ChatModel, ChatOptions, ChatResponse, Message, Prompt } from "../providers/types";

// ============================================================================
// Configuration
// ============================================================================

export interface ChatClientConfig {
  /** Model collaborator */
  model: ChatModel;
  /** System text used when a prompt sets none */
  defaultSystem?: string;
  /** Advisors run on every call, before any per-call advisor */
  defaultAdvisors?: Advisor[];
  /** Advisor parameters merged under every call's own parameters */
  defaultAdvisorParams?: Record<string, unknown>;
  /** Model options merged under every call's own options */
  defaultOptions?: ChatOptions;
  logger?: AdvisorLogger;
}

interface ResolvedChatClientConfig {
  model: ChatModel;
  defaultSystem: string;
  defaultChain: AdvisorChain;
  defaultAdvisorParams: Readonly<Record<string, unknown>>;
  defaultOptions: Readonly<ChatOptions>;
  logger: AdvisorLogger;
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Result of a synchronous call.
 */
export class CallResponse {
  /** Degradations reported during the invocation */
  readonly warnings: readonly AdvisorWarning[];

  constructor(
    private readonly response: ChatResponse,
    readonly context: AdvisorContext
  ) {
    this.warnings = [...context.warnings];
  }

  /** Text of the first generation */
  content(): string {
    return contentOf(this.response);
  }

  chatResponse(): ChatResponse {
    return this.response;
  }
}

/**
 * Result of a streaming call. The request leg has already run; the model
 * is not asked for anything until the sequence is pulled.
 *
 * The sequence is single-shot: `content()` and `chatResponses()` draw from
 * the same source, and once it is drained both yield nothing.
 */
export class StreamResponse {
  constructor(
    private readonly responses: AsyncGenerator<ChatResponse, void, undefined>,
    private readonly context: AdvisorContext
  ) {}

  /** Text deltas in emission order */
  content(): AsyncIterable<string> {
    return mapStream(this.responses, contentOf);
  }

  chatResponses(): AsyncIterable<ChatResponse> {
    return this.responses;
  }

  /**
   * Degradations reported so far. Warnings raised on completion (such as a
   * failed memory write) appear once the sequence has been drained.
   */
  warnings(): readonly AdvisorWarning[] {
    return [...this.context.warnings];
  }
}

// ============================================================================
// Advisor Spec
// ============================================================================

/**
 * Per-call advisor configuration.
 * Parameters use last-write-wins in call order.
 */
export class AdvisorSpec {
  private readonly paramValues: Record<string, unknown> = {};
  private readonly advisorList: Advisor[] = [];

  param(key: string, value: unknown): this {
    this.paramValues[key] = value;
    return this;
  }

  params(values: Record<string, unknown>): this {
    Object.assign(this.paramValues, values);
    return this;
  }

  advisors(...advisors: Advisor[]): this {
    this.advisorList.push(...advisors);
    return this;
  }

  getParams(): Record<string, unknown> {
    return { ...this.paramValues };
  }

  getAdvisors(): Advisor[] {
    return [...this.advisorList];
  }
}

// ============================================================================
// Prompt Spec
// ============================================================================

interface PreparedInvocation {
  prompt: Prompt;
  chain: AdvisorChain;
  context: AdvisorContext;
}

/**
 * One invocation being configured. `call()` and `stream()` each start a
 * fresh invocation with its own context.
 */
export class PromptSpec {
  private systemText?: string;
  private userText: string;
  private messageList: Message[] = [];
  private chatOptions: ChatOptions = {};
  private conversation?: string;
  private readonly advisorSpec = new AdvisorSpec();

  constructor(
    private readonly config: ResolvedChatClientConfig,
    userText = ""
  ) {
    this.userText = userText;
  }

  /** Override the default system text */
  system(text: string): this {
    this.systemText = text;
    return this;
  }

  user(text: string): this {
    this.userText = text;
    return this;
  }

  /** Prior turns placed between the system and user messages */
  messages(...messages: Message[]): this {
    this.messageList.push(...messages);
    return this;
  }

  options(options: ChatOptions): this {
    this.chatOptions = { ...this.chatOptions, ...options };
    return this;
  }

  conversationId(id: string): this {
    this.conversation = id;
    return this;
  }

  /**
   * Configure per-call advisors and parameters, either through a callback or
   * by listing advisors. Per-call advisors run after the default advisors.
   */
  advisors(configure: (spec: AdvisorSpec) => void): this;
  advisors(...advisors: Advisor[]): this;
  advisors(first?: ((spec: AdvisorSpec) => void) | Advisor, ...rest: Advisor[]): this {
    if (typeof first === "function") {
      first(this.advisorSpec);
      return this;
    }
    if (first) {
      this.advisorSpec.advisors(first);
    }
    this.advisorSpec.advisors(...rest);
    return this;
  }

  async call(): Promise<CallResponse> {
    const { prompt, chain, context } = await this.prepare();
    const { model, logger } = this.config;

    let response: ChatResponse;
    try {
      response = await model.call(prompt);
    } catch (error) {
      logger.error("Model call failed", { model: model.name, error: errorMessage(error) });
      throw toAdvisorError(error, { code: "MODEL_CALL_FAILED", collaborator: "model" });
    }

    const advised = await chain.adviseResponse(response, context);
    return new CallResponse(advised, context);
  }

  async stream(): Promise<StreamResponse> {
    const { prompt, chain, context } = await this.prepare();
    const responses = chain.adviseStream(this.modelStream(prompt), context);
    return new StreamResponse(responses, context);
  }

  private async prepare(): Promise<PreparedInvocation> {
    const { defaultAdvisorParams, defaultChain, defaultOptions, defaultSystem } = this.config;

    const params = { ...defaultAdvisorParams, ...this.advisorSpec.getParams() };
    const chain = defaultChain.extend(this.advisorSpec.getAdvisors());
    const context = createAdvisorContext(params);

    const initial = createAdvisedRequest({
      systemText: this.systemText ?? defaultSystem,
      userText: this.userText,
      messages: this.messageList,
      conversationId: this.conversation,
      advisorParams: params,
      chatOptions: { ...defaultOptions, ...this.chatOptions },
    });

    const request = await chain.adviseRequest(initial, context);
    const prompt = toPrompt(request);
    if (!prompt.messages.some((message) => message.role !== "system")) {
      throw new ConfigurationError("INVALID_REQUEST", "Prompt has no user text or messages");
    }
    return { prompt, chain, context };
  }

  private async *modelStream(prompt: Prompt): AsyncGenerator<ChatResponse, void, undefined> {
    const { model, logger } = this.config;
    try {
      yield* model.stream(prompt);
    } catch (error) {
      logger.error("Model stream failed", { model: model.name, error: errorMessage(error) });
      throw toAdvisorError(error, { code: "MODEL_STREAM_FAILED", collaborator: "model" });
    }
  }
}

// ============================================================================
// Chat Client
// ============================================================================

export class ChatClient {
  private readonly config: ResolvedChatClientConfig;

  constructor(config: ChatClientConfig) {
    const logger = config.logger ?? createNoopLogger();
    this.config = {
      model: config.model,
      defaultSystem: config.defaultSystem ?? "",
      defaultChain: new AdvisorChain({ advisors: config.defaultAdvisors, logger }),
      defaultAdvisorParams: { ...config.defaultAdvisorParams },
      defaultOptions: { ...config.defaultOptions },
      logger,
    };
  }

  static builder(model: ChatModel): ChatClientBuilder {
    return new ChatClientBuilder(model);
  }

  /**
   * Start configuring one invocation.
   */
  prompt(userText?: string): PromptSpec {
    return new PromptSpec(this.config, userText);
  }
}

export class ChatClientBuilder {
  private readonly config: ChatClientConfig;

  constructor(model: ChatModel) {
    this.config = { model, defaultAdvisors: [] };
  }

  defaultSystem(text: string): this {
    this.config.defaultSystem = text;
    return this;
  }

  /** Append default advisors; they run in the order given */
  defaultAdvisors(...advisors: Advisor[]): this {
    this.config.defaultAdvisors = [...(this.config.defaultAdvisors ?? []), ...advisors];
    return this;
  }

  defaultAdvisorParams(params: Record<string, unknown>): this {
    this.config.defaultAdvisorParams = { ...this.config.defaultAdvisorParams, ...params };
    return this;
  }

  defaultOptions(options: ChatOptions): this {
    this.config.defaultOptions = { ...this.config.defaultOptions, ...options };
    return this;
  }

  logger(logger: AdvisorLogger): this {
    this.config.logger = logger;
    return this;
  }

  build(): ChatClient {
    return new ChatClient(this.config);
  }
}

export function createChatClient(config: ChatClientConfig): ChatClient {
  return new ChatClient(config);
}
