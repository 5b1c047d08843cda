/**
 * Deterministic answer templates, used whenever no generated answer is available.
 */

import { parseBatteryMah, parseMainCameraMp, type PhoneRecord } from '../../catalog/index.js';
import type { ComparisonResult, CriteriaSet, RetrievalResult } from '../advisorTypes.js';
import { TOP_PICKS } from '../rank/scorePhone.js';

export const NO_PHONES_MESSAGE =
  "I couldn't find any Samsung phones matching your query. Please try rephrasing your question or ask about specific models like Galaxy S24 Ultra, S23, A54, etc.";

export const ASK_FOR_MODELS_MESSAGE =
  "Please ask about specific Samsung phone models or describe what you're looking for.";

export const ASK_FOR_TWO_PHONES_MESSAGE = 'Please specify two phones to compare.';

export const NO_RECOMMENDATIONS_MESSAGE = "I couldn't find phones matching your criteria.";

const BULLET = '•';

function valueOrNa(value: string): string {
  return value.trim().length > 0 ? value : 'N/A';
}

export function renderSpecs(record: PhoneRecord): string {
  const lines = [
    `${record.modelName} specifications:`,
    '',
    `${BULLET} Display: ${valueOrNa(record.display)}`,
    `${BULLET} Battery: ${valueOrNa(record.battery)}`,
    `${BULLET} Camera: ${valueOrNa(record.camera)}`,
    `${BULLET} RAM: ${valueOrNa(record.ram)}`,
    `${BULLET} Storage: ${valueOrNa(record.storage)}`,
    `${BULLET} Chipset: ${valueOrNa(record.chipset)}`,
    `${BULLET} OS: ${valueOrNa(record.os)}`,
    `${BULLET} Price: ${valueOrNa(record.price)}`,
    `${BULLET} Released: ${valueOrNa(record.releaseDate)}`,
  ];
  return lines.join('\n');
}

type SideBySideField = 'display' | 'battery' | 'camera' | 'price';

const SIDE_BY_SIDE: ReadonlyArray<{ label: string; field: SideBySideField }> = [
  { label: 'Display', field: 'display' },
  { label: 'Battery', field: 'battery' },
  { label: 'Camera', field: 'camera' },
  { label: 'Price', field: 'price' },
];

function newerModelLine(recordA: PhoneRecord): string {
  return `${recordA.modelName} is the newer model with improved overall performance and features.`;
}

function cameraLine(recordA: PhoneRecord, recordB: PhoneRecord): string | null {
  const mpA = parseMainCameraMp(recordA.camera);
  const mpB = parseMainCameraMp(recordB.camera);
  if (mpA === null || mpB === null) {
    return null;
  }
  if (mpA > mpB) {
    return `${recordA.modelName} has a better camera (${mpA}MP vs ${mpB}MP) and is recommended for photography.`;
  }
  if (mpB > mpA) {
    return `${recordB.modelName} has a better camera (${mpB}MP vs ${mpA}MP) and is recommended for photography.`;
  }
  return 'Both phones have similar camera capabilities. Consider other factors like price and features.';
}

function batteryLine(recordA: PhoneRecord, recordB: PhoneRecord): string | null {
  const mahA = parseBatteryMah(recordA.battery);
  const mahB = parseBatteryMah(recordB.battery);
  if (mahA === null || mahB === null) {
    return null;
  }
  if (mahA > mahB) {
    return `${recordA.modelName} has better battery life (${mahA}mAh vs ${mahB}mAh).`;
  }
  if (mahB > mahA) {
    return `${recordB.modelName} has better battery life (${mahB}mAh vs ${mahA}mAh).`;
  }
  return 'Both phones have similar battery capacity.';
}

/**
 * One-line verdict. Camera wins when the focus is camera or the question
 * mentions photos; a verdict whose values cannot be parsed on both phones
 * falls back to recommending the first-listed model.
 */
export function comparisonVerdict(comparison: ComparisonResult, criteria: CriteriaSet, question: string): string {
  const { recordA, recordB } = comparison;

  let verdict: string | null = null;
  if (criteria.focus === 'camera' || question.toLowerCase().includes('photo')) {
    verdict = cameraLine(recordA, recordB);
  } else if (criteria.focus === 'battery') {
    verdict = batteryLine(recordA, recordB);
  }

  return verdict ?? newerModelLine(recordA);
}

export function renderComparison(comparison: ComparisonResult, criteria: CriteriaSet, question: string): string {
  const { recordA, recordB } = comparison;
  const sections = [`Comparing ${recordA.modelName} vs ${recordB.modelName}:`];

  for (const { label, field } of SIDE_BY_SIDE) {
    sections.push([
      `${label}:`,
      `  ${BULLET} ${recordA.modelName}: ${valueOrNa(recordA[field])}`,
      `  ${BULLET} ${recordB.modelName}: ${valueOrNa(recordB[field])}`,
    ].join('\n'));
  }

  sections.push(`Recommendation:\n${comparisonVerdict(comparison, criteria, question)}`);

  return sections.join('\n\n');
}

/**
 * Heading for a recommendation list. Battery and camera focus headings take
 * precedence over a budget heading; a display focus has none of its own.
 */
export function recommendationTitle(criteria: CriteriaSet): string {
  if (criteria.focus === 'battery') {
    return 'Best Samsung phones for battery life:';
  }
  if (criteria.focus === 'camera') {
    return 'Best Samsung phones for photography:';
  }
  if (criteria.priceMax !== undefined) {
    return `Best Samsung phones under $${Math.trunc(criteria.priceMax)}:`;
  }
  return 'Based on your requirements, here are my recommendations:';
}

export function renderRecommendation(topPicks: readonly PhoneRecord[], criteria: CriteriaSet): string {
  const [first] = topPicks;
  if (first === undefined) {
    return NO_RECOMMENDATIONS_MESSAGE;
  }

  const entries = topPicks.slice(0, TOP_PICKS).map((record, index) => [
    `${index + 1}. **${record.modelName}**`,
    `   ${BULLET} Price: ${valueOrNa(record.price)}`,
    `   ${BULLET} Battery: ${valueOrNa(record.battery)}`,
    `   ${BULLET} Camera: ${valueOrNa(record.camera)}`,
    `   ${BULLET} Display: ${valueOrNa(record.display)}`,
  ].join('\n'));

  return [
    recommendationTitle(criteria),
    ...entries,
    `Top recommendation: ${first.modelName} offers the best value for your needs.`,
  ].join('\n\n');
}

/**
 * One record reads as a specs question, several as a recommendation.
 */
export function renderGeneral(records: readonly PhoneRecord[], criteria: CriteriaSet): string {
  const [first] = records;
  if (first === undefined) {
    return ASK_FOR_MODELS_MESSAGE;
  }
  return records.length === 1
    ? renderSpecs(first)
    : renderRecommendation(records.slice(0, TOP_PICKS), criteria);
}

/**
 * Renders the answer for a retrieval result without a generator.
 */
export function renderFallback(retrieval: RetrievalResult): string {
  const { records, criteria } = retrieval;
  const [first] = records;

  if (first === undefined) {
    return NO_PHONES_MESSAGE;
  }

  switch (retrieval.intent) {
    case 'comparison':
      if (retrieval.comparison) {
        return renderComparison(retrieval.comparison, criteria, retrieval.question);
      }
      return records.length === 1 ? renderSpecs(first) : ASK_FOR_TWO_PHONES_MESSAGE;

    case 'recommendation':
      return renderRecommendation(
        retrieval.recommendation?.topPicks ?? records.slice(0, TOP_PICKS),
        criteria
      );

    case 'specs':
      return renderSpecs(first);

    case 'general':
    default:
      return renderGeneral(records, criteria);
  }
}
