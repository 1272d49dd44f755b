const REDACTION_PLACEHOLDER = '[REDACTED]';

// Bearer tokens and session ids that remote CLIs echo back in JSON output
const tokenPatterns = [
  /Bearer\s+[A-Za-z0-9._~+/=-]{12,}/g,
  /\b00D[A-Za-z0-9]{12,15}![A-Za-z0-9._]{20,}/g, // org session id
  /gh[pousr]_[a-zA-Z0-9]{20,}/g, // GitHub token
];

// "accessToken": "...", refresh_token=..., CLIENT_SECRET=...
const keyValuePatterns = [
  /("(?:accessToken|refreshToken|access_token|refresh_token|clientSecret|password)"\s*:\s*)"[^"]*"/gi,
  /\b((?:[A-Z0-9_]*(?:TOKEN|SECRET|PASSWORD|API_KEY))\s*=\s*)['"]?[^\s'"]+['"]?/g,
];

const privateKeyPattern = /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g;

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of [...tokenPatterns, privateKeyPattern]) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  for (const pattern of keyValuePatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, (_match, prefix: string) =>
        prefix.trimEnd().endsWith(':')
          ? `${prefix}"${REDACTION_PLACEHOLDER}"`
          : `${prefix}${REDACTION_PLACEHOLDER}`,
      );
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}
