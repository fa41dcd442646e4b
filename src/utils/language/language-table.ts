import fs from "fs";
import { z } from "zod";

const LanguageSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  aliases: z.array(z.string()),
  extensions: z.array(z.string()),
  filenames: z.array(z.string()),
  interpreters: z.array(z.string()),
});

export type Language = Readonly<z.infer<typeof LanguageSchema>>;

export const PLAIN_TEXT_ID = "plaintext";

const LANGUAGES_FILE = new URL("../../../data/languages.json", import.meta.url);

/**
 * Lookup indexes over the static language table. Keys are lowercased except
 * for file names and interpreters, which match case-sensitively.
 */
export class LanguageTable {
  private readonly byToken = new Map<string, Language>();
  private readonly byExtension = new Map<string, Language>();
  private readonly byFilename = new Map<string, Language>();
  private readonly byInterpreter = new Map<string, Language>();

  readonly plainText: Language;

  constructor(readonly languages: ReadonlyArray<Language>) {
    for (const language of languages) {
      // First entry wins so that table order expresses priority.
      for (const token of [language.id, language.name, ...language.aliases]) {
        setOnce(this.byToken, token.toLowerCase(), language);
      }
      for (const extension of language.extensions) {
        setOnce(this.byExtension, extension.toLowerCase(), language);
      }
      for (const filename of language.filenames) {
        setOnce(this.byFilename, filename, language);
      }
      for (const interpreter of language.interpreters) {
        setOnce(this.byInterpreter, interpreter, language);
      }
    }
    const plainText = languages.find((l) => l.id === PLAIN_TEXT_ID);
    if (!plainText) {
      throw new Error(`Language table has no "${PLAIN_TEXT_ID}" entry`);
    }
    this.plainText = plainText;
  }

  /** Match a language id, name, alias, or extension (leading dot allowed). */
  findByToken(token: string): Language | undefined {
    const key = token.trim().toLowerCase();
    if (!key) {
      return undefined;
    }
    return (
      this.byToken.get(key) ?? this.byExtension.get(key.replace(/^\./, ""))
    );
  }

  findByExtension(extension: string): Language | undefined {
    return this.byExtension.get(extension.replace(/^\./, "").toLowerCase());
  }

  findByFilename(filename: string): Language | undefined {
    return this.byFilename.get(filename);
  }

  findByInterpreter(interpreter: string): Language | undefined {
    return this.byInterpreter.get(interpreter);
  }
}

function setOnce<K, V>(map: Map<K, V>, key: K, value: V): void {
  if (!map.has(key)) {
    map.set(key, value);
  }
}

export function parseLanguageTable(data: unknown): LanguageTable {
  return new LanguageTable(z.array(LanguageSchema).parse(data));
}

let defaultTable: LanguageTable | null = null;

/** The bundled table from `data/languages.json`, loaded on first use. */
export function getLanguageTable(): LanguageTable {
  if (!defaultTable) {
    const data: unknown = JSON.parse(fs.readFileSync(LANGUAGES_FILE, "utf-8"));
    defaultTable = parseLanguageTable(data);
  }
  return defaultTable;
}
