const HTML_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'"
};

const MONTHS: Record<string, number> = {
  january: 1, february: 2, march: 3, april: 4, may: 5, june: 6,
  july: 7, august: 8, september: 9, october: 10, november: 11, december: 12,
  jan: 1, feb: 2, mar: 3, apr: 4, jun: 6, jul: 7, aug: 8, sep: 9, sept: 9,
  oct: 10, nov: 11, dec: 12
};

/**
 * Collapse whitespace and decode the entities portals leave in listing text
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  let cleaned = text;
  for (const [entity, replacement] of Object.entries(HTML_ENTITIES)) {
    cleaned = cleaned.split(entity).join(replacement);
  }

  return cleaned.replace(/\s+/g, ' ').trim();
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (year < 1000 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Normalize a UK-style portal date to YYYY-MM-DD.
 * Handles: YYYY-MM-DD, DD/MM/YYYY, DD-MM-YYYY, DD Month YYYY, Month DD, YYYY
 */
export function parseSubmissionDate(dateStr: string | null | undefined): string | null {
  const cleaned = cleanText(dateStr);
  if (!cleaned) {
    return null;
  }

  const iso = cleaned.match(/(\d{4})-(\d{1,2})-(\d{1,2})/);
  if (iso) {
    return toIsoDate(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
  }

  const numeric = cleaned.match(/(\d{1,2})[\/-](\d{1,2})[\/-](\d{4})/);
  if (numeric) {
    return toIsoDate(parseInt(numeric[3], 10), parseInt(numeric[2], 10), parseInt(numeric[1], 10));
  }

  const dayMonthYear = cleaned.match(/(\d{1,2})\s+([A-Za-z]+)\.?,?\s+(\d{4})/);
  if (dayMonthYear) {
    const month = MONTHS[dayMonthYear[2].toLowerCase()];
    if (month) {
      return toIsoDate(parseInt(dayMonthYear[3], 10), month, parseInt(dayMonthYear[1], 10));
    }
  }

  const monthDayYear = cleaned.match(/([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})/);
  if (monthDayYear) {
    const month = MONTHS[monthDayYear[1].toLowerCase()];
    if (month) {
      return toIsoDate(parseInt(monthDayYear[3], 10), month, parseInt(monthDayYear[2], 10));
    }
  }

  return null;
}

/**
 * A plausible application reference has at least one alphanumeric run of four or more
 */
export function isValidProjectId(projectId: string | null | undefined): boolean {
  if (!projectId) {
    return false;
  }
  return /[A-Za-z0-9]{4,}/.test(projectId);
}

export function isValidUrl(url: string | null | undefined): boolean {
  if (!url) {
    return false;
  }

  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

/**
 * Resolve a listing href against the portal base URL; null when the result is not a usable URL
 */
export function resolveUrl(href: string | null | undefined, baseUrl: string): string | null {
  if (!href || href.trim() === '' || href.trim().startsWith('#') || href.trim().toLowerCase().startsWith('javascript:')) {
    return null;
  }

  try {
    const resolved = new URL(href.trim(), baseUrl).toString();
    return isValidUrl(resolved) ? resolved : null;
  } catch {
    return null;
  }
}
