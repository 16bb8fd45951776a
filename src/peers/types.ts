import { z } from 'zod';

// ── Peer configuration ──────────────────────────────────────────────────────

export interface PeerConfig {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  /** Working directory for the child: must exist when set */
  readonly cwd?: string;
  readonly description: string;
  readonly env?: Readonly<Record<string, string>>;
}

// ── Peer status ─────────────────────────────────────────────────────────────

export type PeerStatus = 'stopped' | 'starting' | 'running' | 'terminating';

// ── JSON-RPC envelope ───────────────────────────────────────────────────────

export const RpcIdSchema = z.union([z.string(), z.number()]);
export type RpcId = z.infer<typeof RpcIdSchema>;

export const RpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: RpcIdSchema.nullable().optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: z.unknown().optional(),
});

export type RpcEnvelope = z.infer<typeof RpcEnvelopeSchema>;

export const PROTOCOL_VERSION = '2024-11-05';
export const CLIENT_INFO = { name: 'peerloop', version: '0.1.0' } as const;

// ── Tools ───────────────────────────────────────────────────────────────────

export interface ToolParameter {
  type: string;
  required?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  /** Parameter name → type info, derived from the peer's JSON schema */
  inputSchema: Record<string, ToolParameter>;
  /** The schema exactly as the peer reported it */
  rawSchema: Record<string, unknown>;
}

const RawToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).optional(),
});

export const ToolsListResultSchema = z.object({
  tools: z.array(z.unknown()),
});

/** Turn one entry of a `tools/list` reply into a descriptor, or null if unusable */
export function toToolDescriptor(raw: unknown): ToolDescriptor | null {
  const parsed = RawToolSchema.safeParse(raw);
  if (!parsed.success) return null;
  const schema = parsed.data.inputSchema ?? {};
  const properties = schema.properties;
  const required = Array.isArray(schema.required)
    ? schema.required.filter((r): r is string => typeof r === 'string')
    : [];

  const inputSchema: Record<string, ToolParameter> = {};
  if (properties && typeof properties === 'object' && !Array.isArray(properties)) {
    for (const [param, spec] of Object.entries(properties)) {
      const type = spec && typeof spec === 'object' && 'type' in spec && typeof spec.type === 'string'
        ? spec.type
        : 'string';
      inputSchema[param] = required.includes(param) ? { type, required: true } : { type };
    }
  }

  return {
    name: parsed.data.name,
    description: parsed.data.description ?? `Tool ${parsed.data.name}`,
    inputSchema,
    rawSchema: schema,
  };
}

// ── Outcomes ────────────────────────────────────────────────────────────────

/** Transport-level results are values, never thrown */
export type PeerOutcome<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
