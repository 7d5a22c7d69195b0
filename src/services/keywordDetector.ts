/**
 * Return the keywords found in the text, case-insensitively, in keyword order.
 * Plain substring containment: "monitoring" matches "Structural monitoring survey".
 */
export function detectKeywords(text: string | null | undefined, keywords: readonly string[]): string[] {
  if (!text) {
    return [];
  }

  const haystack = text.toLowerCase();
  const detected: string[] = [];

  for (const keyword of keywords) {
    const needle = keyword.toLowerCase();
    if (needle && haystack.includes(needle) && !detected.includes(keyword)) {
      detected.push(keyword);
    }
  }

  return detected;
}
