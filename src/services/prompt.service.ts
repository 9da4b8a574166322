import { READING_LEVELS, ReadingLevel, Specialty } from '../config/guide';

export interface GuidePromptInput {
  symptoms: string;
  specialty: Specialty;
  readingLevel: ReadingLevel;
}

export const GUIDE_SECTIONS = Object.freeze([
  'Possible causes (plain language, no diagnosis)',
  '5 priority questions for the doctor',
  'Appointment preparation tips',
] as const);

const vocabularyRule = (level: ReadingLevel): string =>
  level <= 2
    ? 'Use only short words of 1-2 syllables'
    : 'You may use medical terms, but explain each one in plain words';

/**
 * Builds the user instruction for the guide. Pure string composition: the same
 * input always yields the same prompt.
 */
export function buildGuidePrompt({ symptoms, specialty, readingLevel }: GuidePromptInput): string {
  const levelLabel = READING_LEVELS[readingLevel];
  const sections = GUIDE_SECTIONS.map((section, index) => `${index + 1}. ${section}`).join('\n');

  return `You are a health assistant for patients seeing a ${specialty}.
Given these symptoms: ${symptoms}

Create a guide at ${levelLabel} reading level:
${sections}

Rules:
- Use bullet points
- ${vocabularyRule(readingLevel)}
- Never suggest treatments
- Use only standard ASCII characters`;
}

export function buildStyleInstruction(readingLevel: ReadingLevel): string {
  let prompt = `You write patient education material at a ${READING_LEVELS[readingLevel]} reading level.

**RESPONSE GUIDELINES:**
- You do not diagnose, and you never recommend treatments or medications
- Keep every section short and concrete
- Use plain bullet points and standard ASCII characters only`;

  if (readingLevel <= 2) {
    prompt += '\n\n**LANGUAGE LEVEL:** Use very simple words and short sentences. Avoid medical jargon entirely.';
  } else if (readingLevel <= 4) {
    prompt += '\n\n**LANGUAGE LEVEL:** Medical terms are allowed when each is followed by a plain explanation.';
  } else {
    prompt += '\n\n**LANGUAGE LEVEL:** Write for a college-educated reader; define specialist terms briefly.';
  }

  return prompt;
}
