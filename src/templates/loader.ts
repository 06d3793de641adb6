/**
 * Template loader.
 *
 * Loads templates from disk (.md or .txt files), parses and validates them,
 * and caches the parsed result. Create one loader per directory and reuse it;
 * only the context changes between renders.
 *
 *   const loader = new TemplateLoader("templates/reports");
 *   const academic = loader.load("academic.md");
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

/** File extensions recognized as templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

export class TemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing template files
   * @throws TemplateLoadError if the directory does not exist
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  get directory(): string {
    return this.baseDir;
  }

  /**
   * Load and parse a single template file (cached).
   *
   * @param filename - Filename relative to baseDir (e.g. "academic.md")
   * @throws TemplateLoadError   if the file is missing or has the wrong extension
   * @throws TemplateParseError  if the template references unknown variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);
    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const parsed = parseTemplate(readFileSync(filePath, "utf-8"), basename(filename, ext));
    this.cache.set(filename, parsed);
    return parsed;
  }

  /**
   * Whether a template file exists in the base directory.
   */
  has(filename: string): boolean {
    const filePath = join(this.baseDir, filename);
    return existsSync(filePath) && statSync(filePath).isFile();
  }

  /**
   * Load every template file in the base directory (flat, no recursion).
   */
  loadAll(): Map<string, ParsedTemplate> {
    const result = new Map<string, ParsedTemplate>();
    for (const entry of TemplateLoader.listTemplates(this.baseDir)) {
      result.set(entry, this.load(entry));
    }
    return result;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * List template filenames in a directory without loading them.
   */
  static listTemplates(dir: string): string[] {
    const resolved = resolve(dir);
    if (!existsSync(resolved)) return [];

    return readdirSync(resolved)
      .filter((entry) => {
        const full = join(resolved, entry);
        if (!statSync(full).isFile()) return false;
        return TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
      })
      .sort();
  }
}
