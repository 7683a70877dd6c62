import type { AdvisorLogger } from "../../logging";
import { contentOf } from "../../providers/responses";
import type { ChatResponse } from "../../providers/types";
import type { AdvisedRequest } from "../advisedRequest";
import type { AdvisorContext } from "../advisorContext";
import { tapStream } from "../streams";
import type { Advisor } from "../types";

export interface LoggingAdvisorConfig {
  logger: AdvisorLogger;
  formatRequest?: (request: AdvisedRequest) => Record<string, unknown>;
  formatResponse?: (text: string, response?: ChatResponse) => Record<string, unknown>;
  /** Advisor name (default: "LoggingAdvisor") */
  name?: string;
}

function defaultFormatRequest(request: AdvisedRequest): Record<string, unknown> {
  return {
    systemText: request.systemText,
    userText: request.userText,
    messageCount: request.messages.length,
    conversationId: request.conversationId,
  };
}

function defaultFormatResponse(text: string, response?: ChatResponse): Record<string, unknown> {
  return {
    content: text,
    model: response?.metadata.model,
    usage: response?.metadata.usage,
  };
}

/**
 * Logs the advised request and the final response at debug level.
 * Streams are logged once, on completion, with the concatenated text.
 */
export class LoggingAdvisor implements Advisor {
  readonly name: string;

  private readonly logger: AdvisorLogger;
  private readonly formatRequest: (request: AdvisedRequest) => Record<string, unknown>;
  private readonly formatResponse: (text: string, response?: ChatResponse) => Record<string, unknown>;

  constructor(config: LoggingAdvisorConfig) {
    this.name = config.name ?? "LoggingAdvisor";
    this.logger = config.logger;
    this.formatRequest = config.formatRequest ?? defaultFormatRequest;
    this.formatResponse = config.formatResponse ?? defaultFormatResponse;
  }

  adviseRequest(request: AdvisedRequest, _context: AdvisorContext): AdvisedRequest {
    this.logger.debug("Advised request", this.formatRequest(request));
    return request;
  }

  adviseResponse(response: ChatResponse, _context: AdvisorContext): ChatResponse {
    this.logger.debug("Chat response", this.formatResponse(contentOf(response), response));
    return response;
  }

  adviseStream(
    responses: AsyncIterable<ChatResponse>,
    _context: AdvisorContext
  ): AsyncIterable<ChatResponse> {
    let text = "";
    let last: ChatResponse | undefined;
    return tapStream(responses, {
      onItem: (chunk) => {
        text += contentOf(chunk);
        last = chunk;
      },
      onComplete: () => {
        this.logger.debug("Chat response stream completed", this.formatResponse(text, last));
      },
    });
  }
}

export function createLoggingAdvisor(config: LoggingAdvisorConfig): LoggingAdvisor {
  return new LoggingAdvisor(config);
}
