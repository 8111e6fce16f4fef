/**
 * League message envelope.
 *
 * Agents exchange `league.v1` envelopes as tool arguments. The client core
 * carries them without looking inside `payload`; it only reads
 * `message_type` to pick a response deadline.
 */

import { randomUUID } from "node:crypto";
import { Type } from "@sinclair/typebox";
import type { Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const LEAGUE_PROTOCOL = "league.v1";

export const AgentType = Type.Union([
  Type.Literal("league_manager"),
  Type.Literal("referee"),
  Type.Literal("player"),
]);

export const EnvelopeSender = Type.Object({
  agent_type: AgentType,
  agent_id: Type.String({ minLength: 1 }),
});

export const LeagueEnvelope = Type.Object({
  protocol: Type.Literal(LEAGUE_PROTOCOL),
  message_type: Type.String({ minLength: 1 }),
  league_id: Type.String(),
  conversation_id: Type.String({ minLength: 1 }),
  /** ISO-8601 UTC, e.g. "2025-01-15T10:30:00.000Z". */
  timestamp: Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?Z$" }),
  sender: EnvelopeSender,
  auth_token: Type.Optional(Type.String()),
  payload: Type.Record(Type.String(), Type.Unknown()),
});

export type AgentTypeValue = Static<typeof AgentType>;
export type EnvelopeSenderType = Static<typeof EnvelopeSender>;
export type LeagueEnvelopeType = Static<typeof LeagueEnvelope>;

// ---------------------------------------------------------------------------
// Response deadlines
// ---------------------------------------------------------------------------

/** Deadline for messages whose type is not listed below. */
export const DEFAULT_ENVELOPE_TIMEOUT_MS = 10_000;

/** Response deadline per message type, in milliseconds. */
export const MESSAGE_TYPE_TIMEOUTS_MS: Readonly<Record<string, number>> = Object.freeze({
  REFEREE_REGISTER_REQUEST: 10_000,
  REFEREE_REGISTER_RESPONSE: 10_000,
  LEAGUE_REGISTER_REQUEST: 10_000,
  LEAGUE_REGISTER_RESPONSE: 10_000,
  GAME_JOIN_ACK: 5_000,
  GAME_INVITE_RESPONSE: 5_000,
  CHOOSE_PARITY: 30_000,
  MOVE_REQUEST: 30_000,
  MOVE_RESPONSE: 30_000,
  GAME_OVER: 5_000,
  GAME_END: 5_000,
  MATCH_RESULT_REPORT: 10_000,
  LEAGUE_QUERY: 10_000,
});

export function timeoutForMessageType(messageType: string): number {
  return Object.hasOwn(MESSAGE_TYPE_TIMEOUTS_MS, messageType)
    ? MESSAGE_TYPE_TIMEOUTS_MS[messageType]
    : DEFAULT_ENVELOPE_TIMEOUT_MS;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface CreateEnvelopeOptions {
  readonly messageType: string;
  readonly leagueId: string;
  readonly sender: EnvelopeSenderType;
  readonly payload?: Record<string, unknown>;
  readonly authToken?: string;
  /** Continue an existing conversation; a new id is generated otherwise. */
  readonly conversationId?: string;
  readonly now?: Date;
}

export function createEnvelope(options: CreateEnvelopeOptions): LeagueEnvelopeType {
  const envelope: LeagueEnvelopeType = {
    protocol: LEAGUE_PROTOCOL,
    message_type: options.messageType,
    league_id: options.leagueId,
    conversation_id: options.conversationId ?? randomUUID(),
    timestamp: (options.now ?? new Date()).toISOString(),
    sender: { ...options.sender },
    payload: { ...(options.payload ?? {}) },
  };
  if (options.authToken !== undefined) {
    envelope.auth_token = options.authToken;
  }
  return envelope;
}

/** Structural check of an envelope; `payload` contents are not inspected. */
export function isLeagueEnvelope(value: unknown): value is LeagueEnvelopeType {
  return Value.Check(LeagueEnvelope, value);
}
