import { ConfigError } from '@patchproof/shared';
import { tokenize } from '../classify/parser';

export type TemplateVars = Record<string, string | number | undefined>;

const PLACEHOLDER_RE = /\{([A-Za-z][A-Za-z0-9]*)\}/g;

/**
 * Expands an environment command template into an argv.
 *
 * The template is split into words first and placeholders are substituted per word,
 * so a value containing spaces or quotes stays a single argument.
 * Every placeholder must have a value.
 */
export function renderArgv(template: string, vars: TemplateVars): string[] {
  return tokenize(template).map((word) =>
    word.replace(PLACEHOLDER_RE, (_match, name: string) => {
      const value = vars[name];
      if (value === undefined) {
        throw new ConfigError(`Command template "${template}" uses {${name}}, which has no value here`);
      }
      return String(value);
    }),
  );
}

/**
 * Substitutes known placeholders into a task command line. Unknown `{...}` text is left alone,
 * since task commands may contain braces of their own.
 */
export function renderCommand(command: string, vars: TemplateVars): string {
  return command.replace(PLACEHOLDER_RE, (match, name: string) => {
    const value = vars[name];
    return value === undefined ? match : String(value);
  });
}
