const IdentitySchema = {
  type: "object",
  required: ["session_id", "participant"],
  properties: {
    session_id: { type: "string", minLength: 1 },
    participant: { type: "string", minLength: 1 },
  },
  additionalProperties: false,
} as const;

export const SessionRecordSchema = {
  type: "object",
  required: ["format", "game", "identity", "initial_state", "responses", "recorded_at"],
  properties: {
    format: { type: "string", const: "tickweave.session/1" },
    game: { type: "string", minLength: 1 },
    identity: IdentitySchema,
    initial_state: {},
    responses: { type: "array" },
    state_hashes: {
      type: "array",
      items: { type: "string", pattern: "^[0-9a-f]{64}$" },
    },
    outcome: {
      oneOf: [
        {
          type: "object",
          required: ["status", "score", "terminal_tick"],
          properties: {
            status: { const: "completed" },
            score: {},
            terminal_tick: { type: "integer", minimum: 0 },
          },
          additionalProperties: false,
        },
        {
          type: "object",
          required: ["status", "error_code", "tick"],
          properties: {
            status: { enum: ["exhausted", "failed", "cancelled"] },
            error_code: { type: "string", minLength: 1 },
            tick: { type: "integer", minimum: 0 },
          },
          additionalProperties: false,
        },
      ],
    },
    recorded_at: { type: "string", format: "date-time" },
  },
  additionalProperties: false,
} as const;
