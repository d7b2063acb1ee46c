/**
 * Diagnostics raised while loading and running a level.
 *
 * Fatal diagnostics abort the level. Warnings leave it playable but with
 * degraded wiring (or, at runtime, a predicate/hook that misbehaved for one
 * tick). Every diagnostic is handed to a DiagnosticSink; the default sink logs
 * it to the console.
 */

import type { GridPosition } from "@signalworks/grid";

export type DiagnosticSeverity = "warning" | "fatal";

export type DiagnosticCode =
  // Load-fatal
  | "missing-player"
  | "missing-exit"
  | "missing-exit-receiver"
  | "missing-geometry"
  | "duplicate-sender"
  | "invalid-sender"
  // Load-degraded
  | "duplicate-player"
  | "duplicate-mapping"
  | "dangling-reference"
  | "invalid-requisite"
  | "invalid-configuration"
  // Runtime-recoverable
  | "predicate-failed"
  | "hook-failed";

export interface LevelDiagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  /** Grid position the diagnostic is about, if any */
  position?: GridPosition;
}

/**
 * Receives diagnostics as they are raised.
 */
export interface DiagnosticSink {
  report(diagnostic: LevelDiagnostic): void;
}

/**
 * Sink that logs diagnostics to the console with a `[SignalNetwork]` prefix.
 */
export const consoleDiagnostics: DiagnosticSink = {
  report(diagnostic) {
    const line = `[SignalNetwork] ${diagnostic.code}: ${diagnostic.message}`;
    if (diagnostic.severity === "fatal") {
      console.error(line);
    } else {
      console.warn(line);
    }
  },
};

/**
 * In-memory sink, useful for tests and level tooling.
 */
export interface CollectingDiagnosticSink extends DiagnosticSink {
  readonly diagnostics: readonly LevelDiagnostic[];
  /** Diagnostics with the given code */
  withCode(code: DiagnosticCode): LevelDiagnostic[];
  /** Whether any fatal diagnostic was reported */
  hasFatal(): boolean;
}

export function collectDiagnostics(): CollectingDiagnosticSink {
  const diagnostics: LevelDiagnostic[] = [];
  return {
    diagnostics,
    report(diagnostic) {
      diagnostics.push(diagnostic);
    },
    withCode(code) {
      return diagnostics.filter((d) => d.code === code);
    },
    hasFatal() {
      return diagnostics.some((d) => d.severity === "fatal");
    },
  };
}

/**
 * Describe a thrown value for a diagnostic message.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Raised (and kept on the session) when a level cannot be loaded.
 */
export class LevelLoadError extends Error {
  readonly diagnostics: readonly LevelDiagnostic[];

  constructor(levelId: string, diagnostics: readonly LevelDiagnostic[]) {
    super(
      `Level "${levelId}" failed to load: ${diagnostics.map((d) => d.message).join("; ")}`,
    );
    this.name = "LevelLoadError";
    this.diagnostics = diagnostics;
  }
}
