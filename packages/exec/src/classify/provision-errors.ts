import { TimeoutError, type ProvisionErrorKind } from '@patchproof/shared';
import { ProviderCommandError } from '../environment/errors';
import defaultPatterns from './provision-patterns.json';
import type { ProvisionErrorClassification, ProvisionPatternSet } from './types';

interface CompiledPattern {
  source: string;
  regex: RegExp;
}

function compile(sources: string[]): CompiledPattern[] {
  return sources.map((source) => ({ source, regex: new RegExp(source, 'i') }));
}

/**
 * Text a provisioning failure is matched against: the message plus any captured command output.
 */
export function errorText(error: unknown): string {
  if (error instanceof ProviderCommandError) {
    return [error.message, error.output].filter(Boolean).join('\n');
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Sorts provisioning failures into transient, terminal and platform-constraint.
 *
 * Platform constraints are checked first, then terminal patterns, then transient ones.
 * Anything unmatched is terminal, so an unknown failure is never retried.
 */
export class ProvisionErrorClassifier {
  private readonly patterns: Record<ProvisionErrorKind, CompiledPattern[]>;

  constructor(extra: Partial<ProvisionPatternSet> = {}) {
    this.patterns = {
      'platform-constraint': compile([
        ...defaultPatterns.platformConstraint,
        ...(extra.platformConstraint ?? []),
      ]),
      terminal: compile([...defaultPatterns.terminal, ...(extra.terminal ?? [])]),
      transient: compile([...defaultPatterns.transient, ...(extra.transient ?? [])]),
    };
  }

  classify(error: unknown): ProvisionErrorClassification {
    if (error instanceof TimeoutError) {
      return { kind: 'transient' };
    }

    const text = errorText(error);
    const order: ProvisionErrorKind[] = ['platform-constraint', 'terminal', 'transient'];
    for (const kind of order) {
      const match = this.patterns[kind].find((p) => p.regex.test(text));
      if (match) return { kind, pattern: match.source };
    }
    return { kind: 'terminal' };
  }

  isTransient(error: unknown): boolean {
    return this.classify(error).kind === 'transient';
  }
}
