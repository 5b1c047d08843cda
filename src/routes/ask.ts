import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { PhoneAdvisor } from '../advisor/index.js';
import { config } from '../config.js';
import { enforceQuestionLimits } from '../validation/index.js';
import { isDebugRequest, sendError, type DebugQuery } from './errorReply.js';

export const askRequestSchema = z.object({
  question: z.string(),
});

export type AskRequestBody = z.infer<typeof askRequestSchema>;

export interface AskRouteOptions {
  advisor: PhoneAdvisor;
}

export async function askRoutes(fastify: FastifyInstance, options: AskRouteOptions) {
  const { advisor } = options;

  fastify.post<{
    Body: AskRequestBody;
    Querystring: DebugQuery;
  }>('/v1/ask', async (request, reply) => {
    const debugEnabled = isDebugRequest(request.query);

    try {
      const body = askRequestSchema.parse(request.body);
      const question = enforceQuestionLimits(body.question, {
        minChars: config.limits.minQuestionChars,
        maxChars: config.limits.maxQuestionChars,
      });

      const result = await advisor.answer(question);

      if (!debugEnabled) {
        return reply.send({ answer: result.text });
      }

      return reply.send({
        answer: result.text,
        intent: result.retrieval.intent,
        criteria: result.retrieval.criteria,
        models: result.retrieval.records.map(record => record.modelName),
        source: result.source,
        attempts: result.attempts,
      });
    } catch (error) {
      return sendError(fastify, request, reply, error, debugEnabled);
    }
  });
}
