/**
 * Fixed prompt text and generation settings for the learner-support assistant.
 */

import type { GenerationSettings } from './provider.js'

export const SYSTEM_PROMPT = `You are the learner-support assistant for an online learning platform.

YOUR ROLE:
- Explain how the platform works: course structure, navigation, enrollment, progress tracking, assessment formats, and certification workflows.
- Help learners understand policies and procedures clearly and concisely.

RULES:
1. Never provide answers to quizzes, exams, assignments, or any assessment question.
2. Never solve, complete, or fill in a question, multiple-choice item, blank, or problem. Decline politely and redirect.
3. Answer from the knowledge-base chunks supplied with each question. Combine every relevant chunk, including lower-ranked ones.
4. If the chunks do not contain enough information, say so and ask a clarifying question instead of guessing.
5. Use bullet points or numbered steps for workflows. Lead with a direct answer and keep it under 400 words.

You explain HOW the platform works. You do not solve academic content.`

/** Returned instead of calling the generator when retrieval confidence is too low. */
export const CLARIFICATION_RESPONSE =
  'I want to make sure I give you an accurate answer. Could you tell me which of these you are asking about?\n' +
  '- **Courses** (enrollment, modules, lessons)\n' +
  '- **Assessments** (quizzes, assignments, final exams)\n' +
  '- **Certificates** (earning, downloading, sharing)\n' +
  '- **Progress tracking** (dashboard and completion metrics)'

/** Returned when a question asks for assessment answers. */
export const SAFE_RESPONSE =
  "I can help you understand how the platform works, but I can't provide answers to assessments, quizzes, or exam questions.\n\n" +
  'I can explain:\n' +
  '- How assessments are structured and graded\n' +
  '- What the passing criteria are\n' +
  '- How to navigate the platform\n\n' +
  'Would you like help with any of those?'

/** Replaces a generated reply that appears to leak assessment answers. */
export const LEAKAGE_BLOCK_RESPONSE =
  'My reply may have included assessment-specific answers, so I have withheld it.\n\n' +
  'I can still explain **how assessments work** on the platform, such as the format or the grading policy.'

export const GENERATION_SETTINGS: Required<GenerationSettings> = {
  temperature: 0.3,
  topP: 0.85,
  maxTokens: 600,
  stopSequences: ['User:', 'Human:'],
}
