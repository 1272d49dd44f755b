import type { ParsedCommand } from './types';

/**
 * Splits a command line into words, honouring single and double quotes and backslash escapes.
 * No expansion of any kind is performed.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let escape = false;

  for (const char of input.trim()) {
    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

/**
 * Parses `KEY=value ... bin args...`. Leading assignments become `env`.
 */
export function parseCommand(input: string): ParsedCommand {
  const tokens = tokenize(input);
  const env: Record<string, string> = {};

  let cmdIndex = 0;
  while (cmdIndex < tokens.length && /^[a-zA-Z_][a-zA-Z0-9_]*=/.test(tokens[cmdIndex])) {
    const token = tokens[cmdIndex];
    const eq = token.indexOf('=');
    env[token.slice(0, eq)] = token.slice(eq + 1);
    cmdIndex++;
  }

  return {
    bin: tokens[cmdIndex] ?? '',
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
  };
}

/**
 * True when the command line relies on shell syntax (pipes, redirects, substitution, chaining).
 */
export function isShellCommand(command: string): boolean {
  return /[|&;<>`$]/.test(command);
}
