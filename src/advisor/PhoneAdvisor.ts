import pino from 'pino';
import type { IPhoneStore, PhoneRecord } from '../catalog/index.js';
import type { RecommendationResult, RetrievalResult } from './advisorTypes.js';
import { compareFirstTwo } from './compare/diffPhones.js';
import { classifyQuery } from './criteria/classifyQuery.js';
import type { GenerationAttempt, GenerationChain } from './generation/index.js';
import { rankPhones } from './rank/scorePhone.js';
import { NO_PHONES_MESSAGE, renderFallback } from './render/fallbackTemplates.js';
import { resolveNames } from './resolve/index.js';

const logger = pino({ name: 'PhoneAdvisor' });

/** Records fetched by a price ceiling when no model was named. */
export const MAX_PRICE_FILTER_RECORDS = 10;

export interface PhoneAdvisorOptions {
  store: IPhoneStore;
  /** Omit to always answer from templates */
  generator?: GenerationChain;
}

export interface AnswerResult {
  text: string;
  source: 'generated' | 'template';
  retrieval: RetrievalResult;
  attempts: GenerationAttempt[];
}

/**
 * Answers phone questions against a catalog.
 *
 * Retrieval is synchronous and holds no state between questions; the only
 * asynchronous step is the optional generator, whose failures degrade to
 * the deterministic templates.
 */
export class PhoneAdvisor {
  private readonly store: IPhoneStore;
  private readonly generator?: GenerationChain;

  constructor(options: PhoneAdvisorOptions) {
    this.store = options.store;
    this.generator = options.generator;
  }

  retrieve(question: string): RetrievalResult {
    const { intent, criteria } = classifyQuery(question);
    const resolvedNames = resolveNames(question, this.store.listAllNames());

    let records: PhoneRecord[];
    if (resolvedNames.length > 0) {
      records = this.fetchByNames(resolvedNames);
    } else if (criteria.priceMax !== undefined) {
      records = this.store.filterByPricePredicate(criteria.priceMax).slice(0, MAX_PRICE_FILTER_RECORDS);
    } else if (intent === 'recommendation') {
      records = this.store.listAll();
    } else {
      records = [];
    }

    const result: RetrievalResult = { question, intent, criteria, resolvedNames, records };

    if (intent === 'comparison') {
      const comparison = compareFirstTwo(records);
      if (comparison) {
        result.comparison = comparison;
      }
    } else if (intent === 'recommendation') {
      const recommendation: RecommendationResult = {
        criteria,
        candidates: records,
        topPicks: rankPhones(records, criteria.focus, criteria),
      };
      result.recommendation = recommendation;
    }

    logger.debug({
      intent,
      criteria,
      resolvedNames,
      recordCount: records.length,
    }, 'Retrieval completed');

    return result;
  }

  async answer(question: string): Promise<AnswerResult> {
    const retrieval = this.retrieve(question);

    if (retrieval.records.length === 0) {
      return { text: NO_PHONES_MESSAGE, source: 'template', retrieval, attempts: [] };
    }

    if (this.generator?.enabled) {
      const outcome = await this.generator.generate({
        question: retrieval.question,
        intent: retrieval.intent,
        criteria: retrieval.criteria,
        records: this.promptRecords(retrieval),
      });

      if (outcome.ok) {
        return { text: outcome.text, source: 'generated', retrieval, attempts: outcome.attempts };
      }

      logger.warn({ attempts: outcome.attempts }, 'All generation attempts failed, rendering template');
      return { text: renderFallback(retrieval), source: 'template', retrieval, attempts: outcome.attempts };
    }

    return { text: renderFallback(retrieval), source: 'template', retrieval, attempts: [] };
  }

  /**
   * Lookup per resolved name, in resolver order. Names that no longer
   * resolve are skipped and a record reached by two names appears once.
   */
  private fetchByNames(names: readonly string[]): PhoneRecord[] {
    const seen = new Set<string>();
    const records: PhoneRecord[] = [];

    for (const name of names) {
      const record = this.store.getByExactOrSubstringName(name);
      if (!record || seen.has(record.modelName)) {
        continue;
      }
      seen.add(record.modelName);
      records.push(record);
    }

    return records;
  }

  /**
   * Ranked picks lead the prompt for recommendations so the generator sees
   * the best candidates first.
   */
  private promptRecords(retrieval: RetrievalResult): PhoneRecord[] {
    if (!retrieval.recommendation) {
      return retrieval.records;
    }
    const picks = retrieval.recommendation.topPicks;
    const pickNames = new Set(picks.map(record => record.modelName));
    return [...picks, ...retrieval.records.filter(record => !pickNames.has(record.modelName))];
  }
}
