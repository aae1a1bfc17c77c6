/**
 * Chat completion model identifiers.
 */
export const ChatModels = {
  Gpt35Turbo: "gpt-3.5-turbo",
  Gpt35Turbo16k: "gpt-3.5-turbo-16k",
  Gpt4: "gpt-4",
  Gpt4_32k: "gpt-4-32k",
  Gpt4Turbo: "gpt-4-turbo",
  Gpt4o: "gpt-4o",
  Gpt4oMini: "gpt-4o-mini",
} as const;

export type ChatModel = (typeof ChatModels)[keyof typeof ChatModels];
