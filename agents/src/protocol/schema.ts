/**
 * Protocol Schemas
 * zod validation for the events and requests the game host sends
 */

import { z } from 'zod';
import { ACTION_TYPES, ROLE_NAMES, type InteractRequest, type PerceiveEvent } from '@wolfpack/shared';
import { ProtocolError } from '../errors.js';

const id = z.string().min(1);
const round = z.number().int().min(1);
const role = z.enum(ROLE_NAMES);
const action = z.enum(ACTION_TYPES);
const candidates = z.array(id);

export const perceiveSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('start'),
    selfId: id,
    role,
    players: z.array(id).min(1),
    teammates: z.array(id).optional(),
    round: round.optional()
  }),
  z.object({ type: z.literal('night'), round }),
  z.object({ type: z.literal('night-info'), round, deaths: z.array(id).default([]) }),
  z.object({ type: z.literal('speech'), round, speaker: id, text: z.string() }),
  z.object({
    type: z.literal('vote-result'),
    round,
    ballots: z.array(z.object({ voter: id, target: id.nullable() })),
    eliminated: id.nullish()
  }),
  z.object({ type: z.literal('check-result'), target: id, alignment: z.enum(['wolf', 'good']) }),
  z.object({ type: z.literal('skill-result'), action, target: id.optional(), success: z.boolean().optional() }),
  z.object({ type: z.literal('shot'), shooter: id, target: id }),
  z.object({
    type: z.literal('game-end'),
    winner: z.enum(['village', 'wolves']).optional(),
    roles: z.record(id, role).optional()
  })
]);

export const interactSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('speak'), round: round.optional() }),
  z.object({ type: z.literal('vote'), candidates }),
  z.object({ type: z.literal('night-action'), candidates, victim: id.nullish() }),
  z.object({ type: z.literal('shoot'), candidates })
]);

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parsePerceiveEvent(body: unknown): PerceiveEvent {
  const result = perceiveSchema.safeParse(body);
  if (!result.success) {
    throw new ProtocolError('Invalid perceive event', issuesOf(result.error));
  }
  return result.data;
}

export function parseInteractRequest(body: unknown): InteractRequest {
  const result = interactSchema.safeParse(body);
  if (!result.success) {
    throw new ProtocolError('Invalid interact request', issuesOf(result.error));
  }
  return result.data;
}
