import type { ProvisionErrorKind } from '@patchproof/shared';

export interface ParsedCommand {
  bin: string;
  args: string[];
  /** Leading `KEY=value` assignments */
  env: Record<string, string>;
  raw: string;
}

export interface ProvisionErrorClassification {
  kind: ProvisionErrorKind;
  /** Source of the pattern that decided the kind, if any */
  pattern?: string;
}

export interface ProvisionPatternSet {
  platformConstraint: string[];
  terminal: string[];
  transient: string[];
}
