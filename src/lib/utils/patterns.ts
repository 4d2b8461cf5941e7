// First capture group, or the whole match, of a case-insensitive pattern
export function matchPattern(pattern: string, text: string): string | undefined {
  const match = new RegExp(pattern, 'i').exec(text);
  if (!match) return undefined;
  const value = (match[1] ?? match[0]).trim();
  return value || undefined;
}

// Newest-first search over customer messages
export function matchInMessages(pattern: string, messages: string[]): string | undefined {
  for (const message of messages) {
    const value = matchPattern(pattern, message);
    if (value) return value;
  }
  return undefined;
}
