/**
 * External Prompt File Loader
 *
 * Loads the summarizer's prompt templates from a .prompt.md file:
 * - YAML frontmatter (version, description, requiredSections)
 * - Section extraction (## SECTION_NAME)
 * - Variable substitution (${variableName})
 * - mtime-based cache so edited prompts are picked up without a restart
 * - Content hashing for version tracking (SHA-256)
 *
 * @module summarizer/prompt-loader
 */

import { readFile, stat } from "fs/promises";
import { createHash } from "crypto";
import path from "path";

import { SummaryPreconditionError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export const SUMMARY_PROMPT_FILE = "article-summary.prompt.md";

export const SUMMARY_PROMPT_SECTIONS = [
  "MINI_SUMMARY",
  "MINI_SUMMARY_REFERENCES",
  "MINI_SUMMARY_REGENERATE",
  "MINI_SUMMARY_REPAIR",
  "FIGURE_NARRATIVE",
  "REDUCE_SUMMARY",
  "SINGLE_SHOT_SUMMARY",
  "SECTION_CHUNK_SUMMARY",
  "SECTION_MERGE",
  "KEY_POINTS",
] as const;

export type SummaryPromptSection = (typeof SUMMARY_PROMPT_SECTIONS)[number];

/** Parsed YAML frontmatter from prompt file */
export interface PromptFrontmatter {
  version: string;
  description: string;
  requiredSections: string[];
}

export interface PromptSection {
  name: string;
  content: string;
}

export interface PromptFile {
  frontmatter: PromptFrontmatter;
  sections: PromptSection[];
  contentHash: string;
  filePath: string;
  loadedAt: string; // ISO timestamp
}

export interface LoadResult {
  success: boolean;
  prompt?: PromptFile;
  warnings: string[];
  errors: string[];
}

/** Renders one section of the loaded summarizer prompt file. */
export interface SummaryPrompts {
  version: string;
  contentHash: string;
  render(section: SummaryPromptSection, variables: Record<string, string>): string;
}

// ============================================================================
// CACHE (mtime-based)
// ============================================================================

interface CachedPrompt {
  prompt: PromptFile;
  mtimeMs: number;
}

const promptCache = new Map<string, CachedPrompt>();

/**
 * Clear prompt cache (for testing or forced reload)
 */
export function clearPromptCache(): void {
  promptCache.clear();
}

// ============================================================================
// FILE PATHS
// ============================================================================

export function getPromptDir(): string {
  return process.env.SUMMARY_PROMPT_DIR || path.resolve(process.cwd(), "prompts");
}

export function hashContent(content: string): string {
  return createHash("sha256").update(content, "utf-8").digest("hex");
}

// ============================================================================
// PARSERS
// ============================================================================

/**
 * Parse the simple YAML subset used in prompt file frontmatter:
 * `key: value` pairs and `key:` followed by `- item` lists.
 */
export function parseFrontmatter(content: string): { frontmatter: PromptFrontmatter | null; body: string } {
  const fmMatch = content.replace(/\r\n/g, "\n").match(/^---\n([\s\S]*?)\n---\n([\s\S]*)$/);
  if (!fmMatch) return { frontmatter: null, body: content };

  const scalars = new Map<string, string>();
  const lists = new Map<string, string[]>();
  let currentList: string[] | null = null;

  for (const line of fmMatch[1].split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    if (trimmed.startsWith("- ") && currentList !== null) {
      currentList.push(trimmed.slice(2).replace(/^["']|["']$/g, ""));
      continue;
    }

    const kvMatch = trimmed.match(/^(\w+):\s*(.*)$/);
    if (!kvMatch) continue;
    const [, key, value] = kvMatch;
    if (value === "") {
      currentList = [];
      lists.set(key, currentList);
    } else {
      currentList = null;
      scalars.set(key, value.replace(/^["']|["']$/g, ""));
    }
  }

  return {
    frontmatter: {
      version: scalars.get("version") ?? "unknown",
      description: scalars.get("description") ?? "",
      requiredSections: lists.get("requiredSections") ?? [],
    },
    body: fmMatch[2],
  };
}

/**
 * Extract sections delimited by `## SECTION_NAME` headers
 */
export function extractSections(body: string): PromptSection[] {
  const sections: PromptSection[] = [];
  let current: PromptSection | null = null;
  let contentLines: string[] = [];

  for (const line of body.replace(/\r\n/g, "\n").split("\n")) {
    const headerMatch = line.match(/^## ([A-Z][A-Z0-9_]+)\s*$/);
    if (headerMatch) {
      if (current) {
        current.content = contentLines.join("\n").trim();
        sections.push(current);
      }
      current = { name: headerMatch[1], content: "" };
      contentLines = [];
    } else if (current) {
      // Horizontal rules separate sections
      if (line.trim() === "---") continue;
      contentLines.push(line);
    }
  }

  if (current) {
    current.content = contentLines.join("\n").trim();
    sections.push(current);
  }
  return sections;
}

// ============================================================================
// LOADING
// ============================================================================

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Load and validate a prompt file, reusing the cached parse while the
 * file's mtime is unchanged.
 */
export async function loadPromptFile(fileName: string = SUMMARY_PROMPT_FILE): Promise<LoadResult> {
  const filePath = path.join(getPromptDir(), fileName);
  const warnings: string[] = [];
  const errors: string[] = [];

  try {
    const fileStats = await stat(filePath);
    const cached = promptCache.get(filePath);
    if (cached && cached.mtimeMs === fileStats.mtimeMs) {
      return { success: true, prompt: cached.prompt, warnings, errors };
    }

    const rawContent = await readFile(filePath, "utf-8");
    const { frontmatter, body } = parseFrontmatter(rawContent);
    if (!frontmatter) {
      errors.push(`No frontmatter block found in ${filePath}`);
      return { success: false, warnings, errors };
    }

    const sections = extractSections(body);
    if (sections.length === 0) {
      errors.push(`No sections found in ${filePath}`);
      return { success: false, warnings, errors };
    }

    const names = new Set(sections.map((s) => s.name));
    for (const required of frontmatter.requiredSections) {
      if (!names.has(required)) errors.push(`Required section "${required}" not found in prompt file`);
    }
    for (const section of sections) {
      if (!section.content) warnings.push(`Section "${section.name}" is empty`);
    }
    if (errors.length > 0) return { success: false, warnings, errors };

    const prompt: PromptFile = {
      frontmatter,
      sections,
      contentHash: hashContent(rawContent),
      filePath,
      loadedAt: new Date().toISOString(),
    };
    promptCache.set(filePath, { prompt, mtimeMs: fileStats.mtimeMs });
    return { success: true, prompt, warnings, errors };
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      errors.push(`Prompt file not found: ${filePath}`);
    } else {
      errors.push(`Failed to load prompt file: ${err instanceof Error ? err.message : String(err)}`);
    }
    return { success: false, warnings, errors };
  }
}

/**
 * Replace ${variableName} placeholders. Unknown variables are left in place
 * and reported.
 */
export function renderTemplate(
  template: string,
  variables: Record<string, string>,
): { content: string; missing: string[] } {
  const missing: string[] = [];
  const content = template.replace(/\$\{(\w+)\}/g, (match, name: string) => {
    if (Object.prototype.hasOwnProperty.call(variables, name)) return variables[name];
    missing.push(name);
    return match;
  });
  return { content, missing };
}

/**
 * Load the summarizer prompt file and return its renderer.
 *
 * @throws SummaryPreconditionError when the file cannot be loaded or a section is missing
 */
export async function loadSummaryPrompts(fileName: string = SUMMARY_PROMPT_FILE): Promise<SummaryPrompts> {
  const result = await loadPromptFile(fileName);
  if (!result.success || !result.prompt) {
    throw new SummaryPreconditionError(`Prompt templates unavailable: ${result.errors.join("; ")}`);
  }
  const prompt = result.prompt;
  for (const warning of result.warnings) console.warn(`[Summary] ${warning}`);

  return {
    version: prompt.frontmatter.version,
    contentHash: prompt.contentHash,
    render(section, variables) {
      const found = prompt.sections.find((s) => s.name === section);
      if (!found) {
        throw new SummaryPreconditionError(`Prompt section "${section}" not found in ${prompt.filePath}`);
      }
      const { content, missing } = renderTemplate(found.content, variables);
      if (missing.length > 0) {
        console.warn(`[Summary] Prompt section "${section}" references unset variables: ${missing.join(", ")}`);
      }
      return content;
    },
  };
}
