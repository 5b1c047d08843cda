import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { PhoneRecord } from '../../catalog/index.js';
import type { CriteriaSet } from '../advisorTypes.js';
import type { GenerationContext } from './generationTypes.js';

/** Records included in a prompt; the rest of the retrieval is left out. */
export const MAX_PROMPT_RECORDS = 5;

export const SYSTEM_PROMPT = `You are a Samsung phone expert assistant. Answer the user's question using only the phone data you are given.

Provide a helpful, concise response that:
1. Directly answers the user's question
2. Includes relevant specifications
3. Gives clear recommendations if asked
4. Highlights key differences in comparisons

Keep the response under 200 words and focus on the most relevant information. If the data does not cover the question, say so instead of guessing.`;

function describeCriteria(criteria: CriteriaSet): string {
  const parts: string[] = [];
  if (criteria.priceMax !== undefined) {
    parts.push(`price at most $${criteria.priceMax}`);
  }
  if (criteria.focus !== undefined) {
    parts.push(`focus on ${criteria.focus}`);
  }
  return parts.length > 0 ? parts.join(', ') : 'none';
}

function describePhone(record: PhoneRecord): string {
  return [
    `Phone: ${record.modelName}`,
    `- Release: ${record.releaseDate}`,
    `- Display: ${record.display}`,
    `- Battery: ${record.battery}`,
    `- Camera: ${record.camera}`,
    `- RAM: ${record.ram}`,
    `- Storage: ${record.storage}`,
    `- Chipset: ${record.chipset}`,
    `- Price: ${record.price}`,
  ].join('\n');
}

export function buildUserPrompt(context: GenerationContext): string {
  const phones = context.records.slice(0, MAX_PROMPT_RECORDS).map(describePhone);

  return [
    `User Question: ${context.question}`,
    `Query Type: ${context.intent}`,
    `Criteria: ${describeCriteria(context.criteria)}`,
    '',
    'Available Phone Data:',
    '',
    phones.join('\n\n'),
  ].join('\n');
}

export function buildPromptMessages(context: GenerationContext): ChatCompletionMessageParam[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: buildUserPrompt(context) },
  ];
}
