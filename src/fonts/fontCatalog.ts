import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { CommandRunner, runCommand } from '../utils/process';

const FONT_EXTENSIONS = ['.ttf', '.otf'];

/**
 * Custom font files that have fontconfig aliases. Their filename is used as-is
 * in the ASS file because mapping them to the fc-query family would drop the
 * bold/italic variant.
 */
const FONTCONFIG_ALIAS_NAMES = new Set(['arialbd', 'ariali', 'arialbi']);

const ARIAL_VARIANT_ALIASES = ['ARIALBD', 'ARIALI', 'ARIALBI'];

/**
 * Read-only view of the fonts known at scan time
 */
export interface FontSnapshot {
  /** Every accepted font_family value */
  availableFontNames(): string[];
  /** Case-insensitive membership test */
  hasFont(name: string): boolean;
  /** Family name usable in an ASS style line (never contains a comma) */
  resolveAssFamily(name: string): string;
}

/**
 * Font names gathered from fontconfig and the custom font directory
 */
export class FontSet implements FontSnapshot {
  private names: Set<string>;
  private lowerNames: Set<string>;
  private filenameToFamily: Map<string, string>;

  constructor(names: Iterable<string>, filenameToFamily: Map<string, string> = new Map()) {
    this.names = new Set(names);
    this.lowerNames = new Set(Array.from(this.names, (name) => name.toLowerCase()));
    this.filenameToFamily = filenameToFamily;
  }

  availableFontNames(): string[] {
    return Array.from(this.names).sort((a, b) => a.localeCompare(b));
  }

  hasFont(name: string): boolean {
    return this.lowerNames.has(name.toLowerCase());
  }

  resolveAssFamily(name: string): string {
    const wanted = name.toLowerCase();
    for (const [filename, family] of this.filenameToFamily) {
      if (filename.toLowerCase() === wanted) {
        return firstFamily(family) || name;
      }
    }
    // ASS uses comma as its field separator
    return firstFamily(name) || name;
  }
}

function firstFamily(family: string): string {
  return (family.split(',')[0] ?? '').trim();
}

export interface FontCatalogOptions {
  customFontsDir: string;
  /** Timeout for each fontconfig query */
  queryTimeoutMs: number;
  runCommand?: CommandRunner;
}

/**
 * Process-wide font catalog. Built once at startup and injected into the
 * caption pipeline; the scan result is cached until invalidate() or refresh().
 */
export class FontCatalog {
  private customFontsDir: string;
  private queryTimeoutMs: number;
  private run: CommandRunner;
  private cached: Promise<FontSet> | null = null;

  constructor(options?: Partial<FontCatalogOptions>) {
    this.customFontsDir = options?.customFontsDir ?? config.customFontsDir;
    this.queryTimeoutMs = options?.queryTimeoutMs ?? config.fontQueryTimeoutMs;
    this.run = options?.runCommand ?? runCommand;
  }

  /**
   * Returns the cached font set, scanning on first use
   */
  snapshot(): Promise<FontSet> {
    if (!this.cached) {
      const scan = this.scan();
      this.cached = scan;
      scan.catch(() => {
        if (this.cached === scan) this.cached = null;
      });
    }
    return this.cached;
  }

  /**
   * Drops the cached scan; the next snapshot() rescans
   */
  invalidate(): void {
    this.cached = null;
  }

  /**
   * Rescans immediately
   */
  refresh(): Promise<FontSet> {
    this.invalidate();
    return this.snapshot();
  }

  private async scan(): Promise<FontSet> {
    const names = new Set<string>(await this.listSystemFamilies());
    const { customNames, filenameToFamily } = await this.scanCustomFonts();

    for (const name of customNames) {
      names.add(name);
    }

    const lowerNames = new Set(Array.from(names, (name) => name.toLowerCase()));
    if (lowerNames.has('arial')) {
      for (const alias of ARIAL_VARIANT_ALIASES) {
        names.add(alias);
      }
    }

    console.info(
      `Available fonts: ${names.size} (fontconfig + ${customNames.length} from ${this.customFontsDir})`
    );
    return new FontSet(names, filenameToFamily);
  }

  /**
   * Lists fontconfig families; a missing or failing fc-list yields none
   */
  private async listSystemFamilies(): Promise<string[]> {
    try {
      const output = await this.run('fc-list', [':', 'family'], { timeoutMs: this.queryTimeoutMs });
      return output
        .split('\n')
        .flatMap((line) => line.split(','))
        .map((family) => family.trim())
        .filter((family) => family);
    } catch (error) {
      console.warn(`fc-list not used: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  /**
   * Every font file in the custom directory is accepted under its filename
   * (without extension); fc-query supplies the family written to ASS files.
   */
  private async scanCustomFonts(): Promise<{
    customNames: string[];
    filenameToFamily: Map<string, string>;
  }> {
    const customNames: string[] = [];
    const filenameToFamily = new Map<string, string>();

    if (!fs.existsSync(this.customFontsDir)) {
      return { customNames, filenameToFamily };
    }

    const entries = await fs.promises.readdir(this.customFontsDir, { withFileTypes: true });

    for (const entry of entries) {
      const ext = path.extname(entry.name).toLowerCase();
      if (!entry.isFile() || !FONT_EXTENSIONS.includes(ext)) continue;

      const nameWithoutExt = path.basename(entry.name, path.extname(entry.name));
      customNames.push(nameWithoutExt);

      if (FONTCONFIG_ALIAS_NAMES.has(nameWithoutExt.toLowerCase())) continue;

      const family = await this.queryFamily(path.join(this.customFontsDir, entry.name));
      if (family) {
        filenameToFamily.set(nameWithoutExt, family);
      }
    }

    return { customNames, filenameToFamily };
  }

  private async queryFamily(fontPath: string): Promise<string | null> {
    try {
      const output = await this.run('fc-query', ['--format=%{family}\n', fontPath], {
        timeoutMs: this.queryTimeoutMs,
      });
      const firstLine = output.trim().split('\n')[0] ?? '';
      return firstFamily(firstLine) || null;
    } catch (error) {
      console.warn(
        `fc-query failed for ${path.basename(fontPath)}: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }
}
