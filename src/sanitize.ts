// src/sanitize.ts — Secret masking for conversation and shell text
// Patterns run in order, most specific first.

const SECRET_PATTERNS: [RegExp, string][] = [
  // JSON web tokens
  [/\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, "jwt.***"],
  // GitHub tokens
  [/\b(gh[pousr]_)[A-Za-z0-9]{20,}/g, "$1***"],
  // sk-/pk- style API keys keep their first 8 characters
  [/\b((?:sk|pk)[-_][A-Za-z0-9]{8})[A-Za-z0-9_-]{8,}/g, "$1***"],
  // Authorization headers
  [/\b(Bearer\s+)[A-Za-z0-9._~+/=-]{8,}/gi, "$1***"],
  // Credentials in URLs and connection strings
  [/\b([a-z][a-z0-9+.-]*:\/\/[^\s:@/]+:)[^\s@/]+@/gi, "$1***@"],
  // SOME_API_KEY=value
  [/\b([A-Z][A-Z0-9_]*(?:KEY|TOKEN|SECRET|PASSWORD))=("[^"]*"|'[^']*'|\S+)/g, "$1=***"],
  // password: value
  [/\b(password|passwd|pwd)(\s*[:=]\s*)("[^"]*"|'[^']*'|\S+)/gi, "$1$2***"],
  // ?token=... / &api_key=...
  [/([?&](?:token|key|api_key|apikey|access_token|secret)=)[^&\s]+/gi, "$1***"],
];

// Long opaque tokens. Pure hex (commit hashes) and digit-free words stay.
const OPAQUE_TOKEN = /\b[A-Za-z0-9]{32,}\b/g;

function maskOpaque(match: string): string {
  return /^[0-9a-f]+$/i.test(match) || !/\d/.test(match) ? match : "***";
}

export function maskSecrets(text: string): string {
  let out = text;
  for (const [pattern, replacement] of SECRET_PATTERNS) {
    out = out.replace(pattern, replacement);
  }
  return out.replace(OPAQUE_TOKEN, maskOpaque);
}
