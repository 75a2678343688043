import type { LanguageDetector } from '../types/translation';
import { AppLogger } from '../utils/logger';
import { countCharacters, previewText } from '../utils/text';
import stopwords from '../data/stopwords.json';

type ScriptName = 'hangul' | 'kana' | 'han' | 'cyrillic' | 'latin';

const SCRIPT_PATTERNS: ReadonlyArray<[ScriptName, RegExp]> = [
  ['hangul', /\p{Script=Hangul}/u],
  ['kana', /[\p{Script=Hiragana}\p{Script=Katakana}]/u],
  ['han', /\p{Script=Han}/u],
  ['cyrillic', /\p{Script=Cyrillic}/u],
  ['latin', /\p{Script=Latin}/u],
];

const MIN_DETECTABLE_LENGTH = 3;

/**
 * Heuristic detector for the client's supported languages. Non-Latin scripts decide
 * the language directly; Latin text is scored by stop-word hits.
 */
export class ScriptLanguageDetector implements LanguageDetector {
  private readonly stopwordSets: ReadonlyArray<[string, ReadonlySet<string>]>;

  constructor(private readonly logger?: AppLogger) {
    this.stopwordSets = Object.entries(stopwords).map(
      ([code, words]): [string, ReadonlySet<string>] => [code, new Set(words)],
    );
  }

  detect(text: string): string | undefined {
    const trimmed = text.trim();

    if (countCharacters(trimmed) < MIN_DETECTABLE_LENGTH) {
      this.logger?.warn('Text too short for reliable language detection.');
      return undefined;
    }

    const counts = this.countScripts(trimmed);
    const detected = this.resolveLanguage(trimmed, counts);

    if (detected) {
      this.logger?.debug(`Detected language ${detected} for "${previewText(trimmed)}".`);
    } else {
      this.logger?.warn(`Could not detect language for "${previewText(trimmed)}".`);
    }

    return detected;
  }

  private countScripts(text: string): Map<ScriptName, number> {
    const counts = new Map<ScriptName, number>();

    for (const character of text) {
      const match = SCRIPT_PATTERNS.find(([, pattern]) => pattern.test(character));

      if (match) {
        counts.set(match[0], (counts.get(match[0]) ?? 0) + 1);
      }
    }

    return counts;
  }

  private resolveLanguage(text: string, counts: Map<ScriptName, number>): string | undefined {
    const hangul = counts.get('hangul') ?? 0;
    const kana = counts.get('kana') ?? 0;
    const han = counts.get('han') ?? 0;
    const cyrillic = counts.get('cyrillic') ?? 0;
    const latin = counts.get('latin') ?? 0;
    const dominant = Math.max(hangul, kana + han, cyrillic, latin);

    if (dominant === 0) {
      return undefined;
    }

    if (hangul === dominant) {
      return 'ko';
    }

    if (kana + han === dominant) {
      return kana > 0 ? 'ja' : 'zh';
    }

    if (cyrillic === dominant) {
      return 'ru';
    }

    return this.scoreLatin(text);
  }

  private scoreLatin(text: string): string | undefined {
    const words = text.toLowerCase().match(/\p{L}+/gu) ?? [];
    let best: { code: string; hits: number } | undefined;

    for (const [code, set] of this.stopwordSets) {
      const hits = words.filter((word) => set.has(word)).length;

      if (hits > 0 && (!best || hits > best.hits)) {
        best = { code, hits };
      }
    }

    return best?.code;
  }
}
