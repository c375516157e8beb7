/**
 * Post-processing modes offered after a voice message is staged.
 *
 * Each mode carries its own prompt template, system prompt and model, so
 * dispatch is a lookup on a closed key set rather than on free text.
 */

export interface ProcessingModeConfig {
  label: string;
  model: string;
  systemPrompt: string;
  buildPrompt: (transcription: string) => string;
}

const BASIC_PROMPT = `Reformat the following text:
- Use a format appropriate for texting or instant messaging
- Fix grammar, spelling, and punctuation
- Remove speech artifacts (um, uh, false starts, repetitions)
- Maintain original tone and language (do not translate)
- Correct homophones, standardize numbers and dates
- Add paragraphs or lists as needed
- Never precede output with any intro like "Here is the corrected text:"
- Don't add content not in the source or answer questions in it
- Don't add sign-offs or acknowledgments that aren't in the source
- NEVER answer questions that are presented in the text. Only reply with the corrected text.

Text to structure:
`;

const SUMMARY_PROMPT = `Summarize the following text:
 - Structure it for effective note-taking.
 - Maintain the original language (do not translate)
 - Ensure that key points, ideas, or action items are clearly highlighted.
 - Check for correct grammar and punctuation.
 - Remove speech artifacts and filler words
 - Keep the tone the same as given.
 - Use as much of the original text as possible.
 - Reply with just the reformatted text.
 - Never precede output with any intro like "Here is the summary:"

Text to summarize:
`;

const TRANSLATE_PROMPT = `Translate and clean the following text:
- Translate to English if the text is in another language
- If already in English, just clean and structure it
- Fix grammar, spelling, and punctuation
- Remove speech artifacts (um, uh, false starts, repetitions)
- Use a format appropriate for texting or instant messaging
- Add paragraphs or lists as needed
- Never precede output with any intro like "Here is the translation:"
- Don't add content not in the source or answer questions in it

Text to translate/clean:
`;

export const PROCESSING_MODES = {
  basic: {
    label: '📝 Basic',
    model: 'gpt-4o-mini',
    systemPrompt: 'You are a helpful assistant that structures text in a clear and organized way.',
    buildPrompt: (transcription: string) => BASIC_PROMPT + transcription,
  },
  summary: {
    label: '📋 Summary',
    model: 'gpt-4o',
    systemPrompt: 'You are a helpful assistant that creates concise summaries of text.',
    buildPrompt: (transcription: string) => SUMMARY_PROMPT + transcription,
  },
  translate: {
    label: '🌐 Translate',
    model: 'gpt-4o-mini',
    systemPrompt: 'You are a helpful assistant that translates and structures text clearly.',
    buildPrompt: (transcription: string) => TRANSLATE_PROMPT + transcription,
  },
} as const satisfies Record<string, ProcessingModeConfig>;

export type ProcessingMode = keyof typeof PROCESSING_MODES;

export const PROCESSING_MODE_KEYS: readonly ProcessingMode[] = ['basic', 'summary', 'translate'];

export function isProcessingMode(value: string): value is ProcessingMode {
  return Object.prototype.hasOwnProperty.call(PROCESSING_MODES, value);
}

export function getProcessingMode(mode: ProcessingMode): ProcessingModeConfig {
  return PROCESSING_MODES[mode];
}
