/**
 * Developer-facing reports of conditions the engine absorbs instead of throwing.
 */

export type DiagnosticKind = "stale-handle-write" | "identity-drift" | "effect-error" | "reaction-error";

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  /** Atom label or dotted identity the report is about */
  target?: string;
  error: Error;
}

export type DiagnosticHandler = (diagnostic: Diagnostic) => void;
