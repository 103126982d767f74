// Fixed replies the system prompt asks the model to use verbatim
export const ANSWER_TEMPLATES = {
  GREETING:
    "Hello! I'm your Insurance Policy Assistant. I can help you with questions about your policy's coverage, premium, or renewal date. Please provide your policy ID or ask a specific question.",
  SENSITIVE:
    "I'm sorry, I cannot share personal or sensitive information like customer names or policy types for privacy and security reasons.",
  OUT_OF_SCOPE:
    "I'm only able to assist with existing policy details like coverage, premium, and renewal dates. For anything else, please contact your insurance advisor or visit the official website.",
  NOT_FOUND: "I couldn't find any policy with that ID. Please check the number and try again.",
  ASK_POLICY_ID: "Could you please provide a valid policy ID so I can help with accurate details?",
  FALLBACK: "I'm not sure how to help with that. Please provide a valid insurance-related question.",
  DISCLAIMER: "**Please consult an insurance advisor for detailed guidance.**",
} as const;

export type AnswerTemplate = keyof typeof ANSWER_TEMPLATES;
