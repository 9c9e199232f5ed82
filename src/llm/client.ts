// ============================================
// LLM Client — generation service over the OpenAI API
// ============================================

import OpenAI from "openai";
import type { ChatCompletionMessageParam, ChatCompletionTool } from "openai/resources/chat/completions.js";
import { config } from "../config/env.js";
import { logger } from "../lib/logger.js";
import { generationError } from "../lib/errors.js";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type GenerationRequest = {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask for a JSON object response */
  jsonMode?: boolean;
  /** Function schemas the model may call */
  tools?: ChatCompletionTool[];
};

/**
 * What a generation call produced: free text, or a request to call a tool.
 */
export type GenerationResult =
  | { type: "text"; text: string }
  | { type: "tool_call"; name: string; arguments: string; text: string };

/**
 * Language generation capability consumed by the router and handlers.
 */
export interface GenerationService {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

/**
 * LLM model configuration.
 * Pin versions for reproducibility.
 */
export const DEFAULT_MODEL = "gpt-4o-mini";

/**
 * OpenAI-backed generation service.
 */
export function createOpenAIGeneration(client: OpenAI, defaultModel: string = DEFAULT_MODEL): GenerationService {
  return {
    async generate(request) {
      const { messages, model = defaultModel, temperature = 0.3, maxTokens = 1000, jsonMode = false, tools } = request;

      try {
        const response = await client.chat.completions.create({
          model,
          messages: messages.map(toOpenAIMessage),
          temperature,
          max_tokens: maxTokens,
          ...(jsonMode && { response_format: { type: "json_object" as const } }),
          ...(tools && tools.length > 0 && { tools, tool_choice: "auto" as const }),
        });

        const message = response.choices[0]?.message;
        const text = message?.content?.trim() ?? "";
        const toolCall = message?.tool_calls?.find((tc) => tc.type === "function");

        if (toolCall) {
          return {
            type: "tool_call",
            name: toolCall.function.name,
            arguments: toolCall.function.arguments,
            text,
          };
        }

        return { type: "text", text };
      } catch (err) {
        logger.error("LLM completion failed", {
          stage: "llm",
          model,
          error: err,
        });
        throw generationError("LLM completion failed", err);
      }
    },
  };
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

let sharedClient: OpenAI | undefined;

/**
 * Process-wide OpenAI client, created on first use.
 */
export function getOpenAIClient(): OpenAI {
  sharedClient ??= new OpenAI({ apiKey: config.openai.apiKey });
  return sharedClient;
}

/**
 * Parse JSON from LLM response, with fallback.
 */
export function parseJsonResponse(response: string): unknown {
  // Try to extract JSON from markdown code blocks
  const jsonMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonStr = jsonMatch?.[1] ?? response;

  try {
    return JSON.parse(jsonStr.trim());
  } catch {
    logger.warn("Failed to parse LLM JSON response", {
      stage: "llm",
      responsePreview: response.slice(0, 100),
    });
    return undefined;
  }
}
