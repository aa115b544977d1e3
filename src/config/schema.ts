// TypeBox schemas for the three config files. Loaded once per run, never mutated.

import { Type, type Static } from "@sinclair/typebox";

const NonEmpty = Type.String({ minLength: 1 });

export const DirectSourceSchema = Type.Object({
  kind: Type.Literal("direct"),
  url: NonEmpty
});

export const JsonFeedSourceSchema = Type.Object({
  kind: Type.Literal("json-feed"),
  url: NonEmpty,
  versionField: NonEmpty,
  urlField: NonEmpty
});

export const GithubReleaseSourceSchema = Type.Object({
  kind: Type.Literal("github-release"),
  repo: Type.String({ pattern: "^[^/\\s]+/[^/\\s]+$" }),
  assetPattern: NonEmpty,
  apiBase: Type.Optional(NonEmpty)
});

export const DownloadSourceSchema = Type.Union([DirectSourceSchema, JsonFeedSourceSchema, GithubReleaseSourceSchema]);

export const ApplicationSpecSchema = Type.Object({
  id: Type.String({ pattern: "^[a-z0-9][a-z0-9._-]*$" }),
  name: NonEmpty,
  bundleId: NonEmpty,
  expectedIdentity: NonEmpty,
  source: DownloadSourceSchema,
  patchTitle: NonEmpty,
  minimumOs: Type.Optional(NonEmpty)
});

export const ApplicationsFileSchema = Type.Array(ApplicationSpecSchema);

export const UserInteractionSchema = Type.Object({
  allowDeferral: Type.Optional(Type.Boolean()),
  deferralDays: Type.Optional(Type.Integer({ minimum: 0 })),
  deadlineDays: Type.Optional(Type.Integer({ minimum: 0 })),
  message: Type.Optional(Type.String())
});

export const CycleSchema = Type.Object({
  name: NonEmpty,
  ordinal: Type.Integer({ minimum: 1 }),
  cohort: NonEmpty,
  paused: Type.Optional(Type.Boolean()),
  userInteraction: Type.Optional(UserInteractionSchema)
});

export const CyclesFileSchema = Type.Object({
  anchorDate: Type.Optional(Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}$" })),
  cycles: Type.Array(CycleSchema, { minItems: 1 })
});

export const WorkflowFileSchema = Type.Object({
  cacheDir: Type.Optional(NonEmpty),
  stateDir: Type.Optional(NonEmpty),
  workDir: Type.Optional(NonEmpty),
  concurrency: Type.Optional(Type.Integer({ minimum: 1, maximum: 64 })),
  retry: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
      baseDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
      maxDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
      jitterRatio: Type.Optional(Type.Number({ minimum: 0, maximum: 1 }))
    })
  ),
  circuit: Type.Optional(
    Type.Object({
      threshold: Type.Optional(Type.Integer({ minimum: 1 }))
    })
  ),
  timeouts: Type.Optional(
    Type.Object({
      requestMs: Type.Optional(Type.Integer({ minimum: 1 })),
      downloadMs: Type.Optional(Type.Integer({ minimum: 1 }))
    })
  ),
  naming: Type.Optional(
    Type.Object({
      pattern: Type.Optional(NonEmpty)
    })
  )
});

export type DownloadSource = Static<typeof DownloadSourceSchema>;
export type ApplicationSpec = Static<typeof ApplicationSpecSchema>;
export type UserInteraction = Static<typeof UserInteractionSchema>;
export type Cycle = Static<typeof CycleSchema>;
export type CyclesFile = Static<typeof CyclesFileSchema>;
export type WorkflowFile = Static<typeof WorkflowFileSchema>;
