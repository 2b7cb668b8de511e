import type { FastifyInstance } from 'fastify';
import * as memberService from '../services/memberService.js';
import type {
  CreateMemberRequest,
  DeactivateMemberRequest,
  MemberListQuery,
  MemberListResponse,
  MemberMutationResponse,
  UpdateMemberRequest,
} from '@office-duties/shared';

// JSON schema for GET /api/members
const listMembersSchema = {
  querystring: {
    type: 'object',
    properties: {
      include_inactive: { type: 'boolean' },
      coffee_drinkers_only: { type: 'boolean' },
    },
    additionalProperties: false,
  },
};

// JSON schema for POST /api/members (add member)
const createMemberSchema = {
  body: {
    type: 'object',
    required: ['username', 'full_name'],
    properties: {
      username: { type: 'string', minLength: 1, maxLength: 50 },
      full_name: { type: 'string', minLength: 1, maxLength: 100 },
      coffee_drinker: { type: 'boolean' },
    },
    additionalProperties: false,
  },
};

// JSON schema for PUT /api/members (update member)
const updateMemberSchema = {
  body: {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'integer', minimum: 1, maximum: Number.MAX_SAFE_INTEGER },
      username: { type: 'string', minLength: 1, maxLength: 50 },
      full_name: { type: 'string', minLength: 1, maxLength: 100 },
      coffee_drinker: { type: 'boolean' },
    },
    additionalProperties: false,
  },
};

// JSON schema for DELETE /api/members (deactivate member)
const deactivateMemberSchema = {
  body: {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'integer', minimum: 1, maximum: Number.MAX_SAFE_INTEGER },
    },
    additionalProperties: false,
  },
};

export default async function memberRoutes(fastify: FastifyInstance) {
  function mutationResponse(message: string): MemberMutationResponse {
    return { message, success: true, members: memberService.listMembers(fastify.db) };
  }

  /**
   * GET /api/members
   * List active members; ?include_inactive=true lists deactivated members too.
   */
  fastify.get<{ Querystring: MemberListQuery }>(
    '/',
    { schema: listMembersSchema },
    async (request, reply) => {
      const members = memberService.listMembers(fastify.db, {
        includeInactive: request.query.include_inactive,
        coffeeDrinkersOnly: request.query.coffee_drinkers_only,
      });
      const response: MemberListResponse = { members };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/members
   * Add a member to the office.
   */
  fastify.post<{ Body: CreateMemberRequest }>(
    '/',
    { schema: createMemberSchema },
    async (request, reply) => {
      const member = memberService.createMember(fastify.db, request.body);
      request.log.info({ memberId: member.id, username: member.username }, 'Added office member');
      return reply.status(200).send(mutationResponse('New member added to the office'));
    },
  );

  /**
   * PUT /api/members
   * Update an office member's username, full name or coffee-drinker flag.
   */
  fastify.put<{ Body: UpdateMemberRequest }>(
    '/',
    { schema: updateMemberSchema },
    async (request, reply) => {
      const member = memberService.updateMember(fastify.db, request.body);
      request.log.info({ memberId: member.id, username: member.username }, 'Updated office member');
      return reply.status(200).send(mutationResponse('Updated office member'));
    },
  );

  /**
   * DELETE /api/members
   * Deactivate an office member. Members are kept for the duty history.
   */
  fastify.delete<{ Body: DeactivateMemberRequest }>(
    '/',
    { schema: deactivateMemberSchema },
    async (request, reply) => {
      const { id } = request.body;
      const changed = memberService.deactivateMember(fastify.db, id);
      if (changed) {
        request.log.info({ memberId: id }, 'Deactivated office member');
      } else {
        request.log.warn({ memberId: id }, 'Office member is already inactive');
      }
      return reply
        .status(200)
        .send(
          mutationResponse(
            changed ? 'Deactivated office member' : 'Office member was already inactive',
          ),
        );
    },
  );
}
