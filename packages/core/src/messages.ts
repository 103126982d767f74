// packages/core/src/messages.ts
export const USER_PROMPT = "\n[You]: ";
export const BOT_PREFIX = "[Chatbot]: ";
export const GOODBYE = `${BOT_PREFIX}Goodbye!`;

export const READY_BANNER = [
  "\n--- Insurance Policy Query Assistant Ready ---",
  "Type 'exit' or 'quit' to end the conversation.",
];

/** Answer used when the model could not be reached after retries */
export const LLM_FALLBACK =
  "I'm sorry, I couldn't process your request right now. Please try again in a moment.";
