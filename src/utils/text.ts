const WORD_REGEX = /[\p{L}\p{N}]+/gu;

// Keeps repeated terms so callers can weight by frequency.
export function tokenizeWithRepeats(text: string): string[] {
  const lower = text.normalize("NFC").toLowerCase();
  const words = lower.match(WORD_REGEX) ?? [];

  const expanded: string[] = [];
  for (const word of words) {
    expanded.push(...expandTokenVariants(word));
  }

  return expanded;
}

export function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export function truncate(text: string, maxChars: number, marker = "..."): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}${marker}`;
}

function expandTokenVariants(token: string): string[] {
  const trimmed = token.trim();
  if (!trimmed) {
    return [];
  }

  const variants = new Set<string>();
  variants.add(trimmed);

  if (trimmed.length >= 4 && trimmed.endsWith("s") && !trimmed.endsWith("ss")) {
    variants.add(trimmed.slice(0, -1));
  }

  return [...variants].filter((word) => word.length >= 2);
}
