export const buildRecipePrompt = (request: string): string => `Generate a detailed recipe for: ${request}`;

export const buildRevisionPrompt = (draft: string, feedback: string): string =>
  `Modify this recipe according to dietary restrictions: ${draft}\nRestrictions: ${feedback}`;

export const buildFeedbackPrompt = (flaggedItems: string): string =>
  `Are you allergic to any of the following ingredients:\n${flaggedItems}\nIf so, please specify which ones.`;
