/** Pipeline stages in topological order */
export const STAGE_KINDS = [
  "source",
  "tokens",
  "ast",
  "optimized-ast",
  "pseudo-bytecode",
  "optimized-pseudo-bytecode",
  "final-bytecode",
] as const;

export type StageKind = (typeof STAGE_KINDS)[number];

export type StageInfo = {
  kind: StageKind;
  title: string;
  /** Key that toggles the stage's panel */
  key: string;
  /** Short id accepted on the command line */
  id: string;
};

export const STAGE_INFO: Readonly<Record<StageKind, StageInfo>> = {
  source: { kind: "source", title: "Source", key: "1", id: "source" },
  tokens: { kind: "tokens", title: "Tokens", key: "2", id: "tokens" },
  ast: { kind: "ast", title: "AST", key: "3", id: "ast" },
  "optimized-ast": {
    kind: "optimized-ast",
    title: "Optimized AST",
    key: "4",
    id: "opt-ast",
  },
  "pseudo-bytecode": {
    kind: "pseudo-bytecode",
    title: "Pseudo Bytecode",
    key: "5",
    id: "pseudo-bc",
  },
  "optimized-pseudo-bytecode": {
    kind: "optimized-pseudo-bytecode",
    title: "Optimized Pseudo Bytecode",
    key: "6",
    id: "opt-pseudo-bc",
  },
  "final-bytecode": {
    kind: "final-bytecode",
    title: "Final Bytecode",
    key: "7",
    id: "code",
  },
};

export const TOOLCHAIN_VERSIONS = ["full", "legacy"] as const;

export type ToolchainVersion = (typeof TOOLCHAIN_VERSIONS)[number];

/** The stage kinds a toolchain version provides */
export type Capabilities = ReadonlySet<StageKind>;

const LEGACY_MISSING: ReadonlySet<StageKind> = new Set([
  "optimized-ast",
  "pseudo-bytecode",
  "optimized-pseudo-bytecode",
]);

export const capabilitiesFor = (version: ToolchainVersion): Capabilities =>
  new Set(
    version === "full"
      ? STAGE_KINDS
      : STAGE_KINDS.filter((kind) => !LEGACY_MISSING.has(kind))
  );

export const DEFAULT_VISIBLE_STAGES: readonly StageKind[] = [
  "source",
  "final-bytecode",
];

export const stageOrder = (kind: StageKind): number => STAGE_KINDS.indexOf(kind);

export const stageFromId = (id: string): StageKind | undefined =>
  STAGE_KINDS.find((kind) => STAGE_INFO[kind].id === id || kind === id);

export const stageFromKey = (key: string): StageKind | undefined =>
  STAGE_KINDS.find((kind) => STAGE_INFO[kind].key === key);
