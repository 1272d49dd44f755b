/**
 * Extracts a JSON object from text that may contain other content,
 * such as warning lines a CLI prints before its `--json` payload.
 * Finds the first '{' and last '}' and parses the content between them.
 *
 * @param context - Optional context for error messages (e.g. 'create', 'deploy')
 * @throws Error if no valid JSON object is found
 */
export function extractJsonObject(text: string, context?: string): unknown {
  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');

  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) {
    const contextStr = context ? ` in ${context} output` : '';
    throw new Error(`No JSON object found${contextStr}.`);
  }

  const jsonText = text.slice(firstBrace, lastBrace + 1);

  try {
    const parsed: unknown = JSON.parse(jsonText);
    return parsed;
  } catch (e) {
    const contextStr = context ? ` from ${context} output` : '';
    throw new Error(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a dotted path such as `result.records` out of parsed JSON.
 */
export function getPath(value: unknown, dottedPath: string): unknown {
  let current: unknown = value;
  for (const key of dottedPath.split('.').filter(Boolean)) {
    if (Array.isArray(current) && /^\d+$/.test(key)) {
      current = current[Number(key)];
    } else if (isRecord(current)) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}
