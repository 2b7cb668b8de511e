import type { FastifyInstance } from 'fastify';
import * as dutyService from '../services/dutyService.js';
import { DUTY_TYPES } from '@office-duties/shared';
import type {
  DutyCompletionRequest,
  DutyCompletionResponse,
  DutyListQuery,
  DutyListResponse,
  RecentDutyQuery,
  RecentDutyResponse,
} from '@office-duties/shared';

// JSON schema for GET /api/duties
const listDutiesSchema = {
  querystring: {
    type: 'object',
    properties: {
      limit: {
        type: 'integer',
        minimum: 1,
        maximum: dutyService.MAX_INTEGER_PARAM,
        default: dutyService.DEFAULT_DUTY_LIMIT,
      },
    },
    additionalProperties: false,
  },
};

// JSON schema for GET /api/duties/recent
const recentDutySchema = {
  querystring: {
    type: 'object',
    required: ['duty_type'],
    properties: {
      duty_type: { type: 'string', enum: DUTY_TYPES },
    },
    additionalProperties: false,
  },
};

// JSON schema for POST /api/duties/complete and /api/duties/uncomplete
const dutyCompletionSchema = {
  body: {
    type: 'object',
    required: ['duty_id', 'duty_type'],
    properties: {
      duty_id: { type: 'integer', minimum: 1, maximum: dutyService.MAX_INTEGER_PARAM },
      duty_type: { type: 'string', enum: DUTY_TYPES },
    },
    additionalProperties: false,
  },
};

export default async function dutyRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/duties
   * List duty assignments with completion status, newest first.
   */
  fastify.get<{ Querystring: DutyListQuery }>(
    '/',
    { schema: listDutiesSchema },
    async (request, reply) => {
      const duties = dutyService.listDuties(fastify.db, request.query.limit);
      const response: DutyListResponse = { duties, total: duties.length };
      return reply.status(200).send(response);
    },
  );

  /**
   * GET /api/duties/recent?duty_type=coffee|fridge
   * Most recent assignment of one duty type.
   */
  fastify.get<{ Querystring: RecentDutyQuery }>(
    '/recent',
    { schema: recentDutySchema },
    async (request, reply) => {
      const duty = dutyService.getMostRecentDuty(fastify.db, request.query.duty_type);
      const response: RecentDutyResponse = { duty };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/duties/complete
   * Mark a duty as completed and return the refreshed duty list.
   */
  fastify.post<{ Body: DutyCompletionRequest }>(
    '/complete',
    { schema: dutyCompletionSchema },
    async (request, reply) => {
      const { duty_id: dutyId, duty_type: dutyType } = request.body;

      const changed = dutyService.completeDuty(fastify.db, dutyId, dutyType);
      if (changed) {
        request.log.info({ dutyId, dutyType }, 'Marked duty as completed');
      } else {
        request.log.warn({ dutyId, dutyType }, 'Duty is already completed');
      }

      const response: DutyCompletionResponse = {
        message: changed ? 'Duty marked as completed successfully' : 'Duty was already completed',
        success: true,
        duties: dutyService.listDuties(fastify.db),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/duties/uncomplete
   * Mark a duty as not completed and return the refreshed duty list.
   */
  fastify.post<{ Body: DutyCompletionRequest }>(
    '/uncomplete',
    { schema: dutyCompletionSchema },
    async (request, reply) => {
      const { duty_id: dutyId, duty_type: dutyType } = request.body;

      const changed = dutyService.uncompleteDuty(fastify.db, dutyId, dutyType);
      if (changed) {
        request.log.info({ dutyId, dutyType }, 'Marked duty as uncompleted');
      } else {
        request.log.warn({ dutyId, dutyType }, 'Duty is already uncompleted');
      }

      const response: DutyCompletionResponse = {
        message: changed
          ? 'Duty marked as uncompleted successfully'
          : 'Duty was already uncompleted',
        success: true,
        duties: dutyService.listDuties(fastify.db),
      };
      return reply.status(200).send(response);
    },
  );
}
