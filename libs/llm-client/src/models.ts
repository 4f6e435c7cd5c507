import { z } from 'zod';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

export type Role = 'system' | 'user' | 'assistant';

export interface Message {
  role: Role;
  content: string;
}

export const Message = {
  system: (content: string): Message => ({ role: 'system', content }),
  user: (content: string): Message => ({ role: 'user', content }),
  assistant: (content: string): Message => ({ role: 'assistant', content }),
};

export function toMessageParam(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export const completionOptionsSchema = z
  .object({
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    topP: z.number().min(0).max(1),
    frequencyPenalty: z.number().min(-2).max(2),
    presencePenalty: z.number().min(-2).max(2),
    stop: z.array(z.string()).max(4),
  })
  .partial()
  .strict();

/** Sampling controls; unset fields are left to the provider's defaults. */
export type CompletionOptions = z.infer<typeof completionOptionsSchema>;

const roleSchema = z.enum(['system', 'user', 'assistant']);

export const chatCompletionResponseSchema = z
  .object({
    id: z.string(),
    model: z.string(),
    created: z.number(),
    choices: z.array(
      z.object({
        index: z.number().int(),
        message: z.object({
          role: roleSchema,
          content: z.string().nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    ),
    usage: z.object({
      prompt_tokens: z.number().int(),
      completion_tokens: z.number().int(),
      total_tokens: z.number().int(),
    }),
  })
  .transform((raw) => {
    const choices = raw.choices.map((choice) => ({
      index: choice.index,
      message: { role: choice.message.role, content: choice.message.content ?? undefined },
      finishReason: choice.finish_reason ?? undefined,
    }));
    return {
      id: raw.id,
      model: raw.model,
      created: raw.created,
      choices,
      content: choices[0]?.message.content,
      usage: Object.freeze({
        promptTokens: raw.usage.prompt_tokens,
        completionTokens: raw.usage.completion_tokens,
        totalTokens: raw.usage.total_tokens,
      }),
    };
  });

export type ChatCompletionResult = z.infer<typeof chatCompletionResponseSchema>;
export type Choice = ChatCompletionResult['choices'][number];
export type Usage = ChatCompletionResult['usage'];
