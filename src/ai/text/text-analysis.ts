import stopwordList from './stopwords.json';

const TOKEN_PATTERN = /[A-Za-z0-9']+/g;
const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const HUMOR_MARKERS = ['lol', 'lmao', 'haha', 'hehe', '😂', '🤣', '😹', 'meme'];
const TECH_MARKERS = [
  'api', 'code', 'model', 'deploy', 'release', 'ai', 'ml', 'data', 'research', 'update', 'version', 'script',
];
const SENTIMENT_MARKERS: Readonly<Record<string, number>> = {
  amazing: 1,
  awesome: 1,
  love: 1,
  great: 1,
  good: 1,
  thrilled: 1,
  hate: -1,
  terrible: -1,
  awful: -1,
  bad: -1,
  furious: -1,
};

export type Tone = 'playful' | 'technical' | 'enthusiastic' | 'cautious' | 'conversational';

export function tokenize(text: string): string[] {
  return (text.match(TOKEN_PATTERN) ?? []).map((token) => token.toLowerCase());
}

function isInformative(token: string): boolean {
  return token.length > 2 && !STOPWORDS.has(token);
}

/** Lower-cased informative tokens, for overlap checks. */
export function tokenizeForOverlap(text: string): Set<string> {
  return new Set(tokenize(text).filter(isInformative));
}

/** Most frequent informative tokens; ties go to the shorter, then the later-sorting token. */
export function extractKeywords(texts: readonly string[], maxKeywords = 8): string[] {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const token of tokenize(text).filter(isInformative)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort(([a, countA], [b, countB]) => {
      if (countA !== countB) return countB - countA;
      if (a.length !== b.length) return a.length - b.length;
      return a < b ? 1 : a > b ? -1 : 0;
    })
    .slice(0, maxKeywords)
    .map(([token]) => token);
}

function occurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

export function inferTone(texts: readonly string[]): Tone {
  let humor = 0;
  let tech = 0;
  let exclamations = 0;
  let sentiment = 0;

  for (const text of texts) {
    const lowered = text.toLowerCase();
    humor += HUMOR_MARKERS.filter((marker) => lowered.includes(marker)).length;
    tech += TECH_MARKERS.filter((marker) => lowered.includes(marker)).length;
    exclamations += occurrences(lowered, '!');
    for (const [marker, weight] of Object.entries(SENTIMENT_MARKERS)) {
      sentiment += occurrences(lowered, marker) * weight;
    }
  }

  if (humor >= Math.max(1, Math.floor(tech / 2))) return 'playful';
  if (tech > 0 && tech >= humor) return 'technical';
  if (exclamations > 2 || sentiment > 2) return 'enthusiastic';
  if (sentiment < -1) return 'cautious';
  return 'conversational';
}

export function isProbablyHumorous(text: string): boolean {
  const tokens = tokenizeForOverlap(text);
  return HUMOR_MARKERS.some((marker) => tokens.has(marker));
}

export function describeMedia(urls: readonly string[]): string {
  if (urls.length === 0) {
    return 'No media attached.';
  }
  let images = 0;
  let videos = 0;
  let gifs = 0;
  for (const url of urls) {
    const lowered = url.toLowerCase();
    if (lowered.endsWith('.gif')) gifs += 1;
    else if (lowered.endsWith('.mp4') || lowered.endsWith('m3u8')) videos += 1;
    else images += 1;
  }
  const parts: string[] = [];
  if (images) parts.push(`${images} image(s)`);
  if (videos) parts.push(`${videos} video(s)`);
  if (gifs) parts.push(`${gifs} gif(s)`);
  return `Media detected: ${parts.join(', ')}.`;
}
