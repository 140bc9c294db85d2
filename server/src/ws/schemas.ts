import { z } from 'zod';

export const DEFAULT_COLS = 80;
export const DEFAULT_ROWS = 24;
export const DEFAULT_BAUD_RATE = 9600;

const sessionId = z.string().min(1);

/** Any frame: a `type` tag plus whatever else it carries. */
export const envelopeSchema = z
  .object({
    type: z.string(),
    session: z.string().optional(),
  })
  .passthrough();

export const newSessionSchema = z.object({
  type: z.literal('new_session'),
  session: sessionId,
});

export const closeSessionSchema = z.object({
  type: z.literal('close_session'),
  session: sessionId,
});

export const inputSchema = z.object({
  type: z.literal('input'),
  session: sessionId,
  data: z.string().default(''),
});

export const resizeSchema = z.object({
  type: z.literal('resize'),
  session: sessionId,
  cols: z.number().int().positive().default(DEFAULT_COLS),
  rows: z.number().int().positive().default(DEFAULT_ROWS),
});

export const setBaudRateSchema = z.object({
  type: z.literal('setBaudRate'),
  session: sessionId,
  baudRate: z.number().int().positive().default(DEFAULT_BAUD_RATE),
});

/** Router → pool manager. */
export const poolCommandSchema = z.discriminatedUnion('type', [
  newSessionSchema,
  closeSessionSchema,
  inputSchema,
  resizeSchema,
  setBaudRateSchema,
]);

const textEvent = <T extends 'output' | 'error' | 'exit'>(type: T) =>
  z.object({
    type: z.literal(type),
    session: sessionId,
    data: z.string(),
  });

/** Pool manager → router. */
export const poolEventSchema = z.discriminatedUnion('type', [
  textEvent('output'),
  textEvent('error'),
  textEvent('exit'),
]);

/** Router → browser or bridge: a pool event without its session id. */
export const clientEventSchema = z.discriminatedUnion('type', [
  textEvent('output').omit({ session: true }),
  textEvent('error').omit({ session: true }),
  textEvent('exit').omit({ session: true }),
]);

/** Frame types only the router itself may originate. */
export const ROUTER_ONLY_TYPES: readonly string[] = ['new_session', 'close_session'];
