/**
 * Typebox schema for the optional JSON config file (`--config.path`).
 *
 * Produces both the runtime validator (via `Value.Check`) and the static
 * TypeScript type via `Static<>`.
 */

import { Type, type Static } from "@sinclair/typebox";

const Duration = Type.String({ minLength: 1 });

export const ConfigFile = Type.Object(
  {
    targets: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    dns: Type.Optional(
      Type.Object(
        {
          refresh: Type.Optional(Duration),
          nameserver: Type.Optional(Type.String()),
        },
        { additionalProperties: false },
      ),
    ),
    ping: Type.Optional(
      Type.Object(
        {
          interval: Type.Optional(Duration),
          timeout: Type.Optional(Duration),
          "history-size": Type.Optional(Type.Integer({ minimum: 0 })),
          "payload-size": Type.Optional(Type.Integer({ minimum: 0 })),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFile>;
