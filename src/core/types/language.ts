/** Languages the analyzer has a grammar and counting rules for. */
export const SUPPORTED_LANGUAGES = ['Rust', 'Go', 'Python', 'JavaScript', 'TypeScript', 'TSX', 'Java'] as const;

export type SupportedLanguage = typeof SUPPORTED_LANGUAGES[number];
