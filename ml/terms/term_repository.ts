import fs from "node:fs";

import type { GradeValue, TermRecord } from "../rag/types";
import type { Logger } from "../logging/logger";
import { configurationError, errorMessage } from "../matcher/errors";
import { assertValid, collectErrors, validateTermRecord, validateTermsFile } from "../schemas/validators";
import { DEFAULT_CTCAE_VERSION } from "./ctcae_source";

/**
 * Read-only view over the canonical term list. Invalid or duplicate records
 * are dropped at load time with a warning.
 */
export class TermRepository {
  readonly version: string;
  private readonly terms: TermRecord[];
  private readonly categories: string[];
  private readonly byName: Map<string, TermRecord>;

  constructor(params: { terms: unknown[]; version?: string; logger?: Logger }) {
    const accepted: TermRecord[] = [];
    const byName = new Map<string, TermRecord>();

    params.terms.forEach((candidate, position) => {
      if (!validateTermRecord(candidate)) {
        params.logger?.warn(`term #${position} skipped: ${collectErrors(validateTermRecord).join("; ")}`);
        return;
      }
      const key = candidate.ctcae_term.trim().toLowerCase();
      if (byName.has(key)) {
        params.logger?.warn(`term #${position} skipped: duplicate name ${candidate.ctcae_term}`);
        return;
      }
      byName.set(key, candidate);
      accepted.push(candidate);
    });

    this.terms = accepted;
    this.byName = byName;
    this.version = params.version ?? DEFAULT_CTCAE_VERSION;
    // Derived from accepted terms; a file's own list may name SOCs whose terms were dropped.
    this.categories = Array.from(new Set(accepted.map((term) => term.meddra_soc).filter(Boolean))).sort();
  }

  static fromFile(filePath: string, logger?: Logger): TermRepository {
    if (!fs.existsSync(filePath)) {
      throw configurationError(`CTCAE terms file not found at ${filePath}`);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (error) {
      throw configurationError(`CTCAE terms file ${filePath} is not valid JSON: ${errorMessage(error)}`);
    }
    assertValid(validateTermsFile, parsed, "CtcaeTermsFile");
    const repository = new TermRepository({
      terms: parsed.terms,
      version: parsed.version,
      logger,
    });
    logger?.info(`loaded ${repository.size} terms from ${filePath}`);
    return repository;
  }

  get size(): number {
    return this.terms.length;
  }

  all(): TermRecord[] {
    return [...this.terms];
  }

  getTermByName(name: string): TermRecord | undefined {
    return this.byName.get(name.trim().toLowerCase());
  }

  getGradeDescription(termName: string, grade: GradeValue | string): string | undefined {
    return this.getTermByName(termName)?.grades.find((entry) => entry.grade === grade)?.description;
  }

  getCategories(): string[] {
    return [...this.categories];
  }

  getTermsByCategory(category: string): TermRecord[] {
    return this.terms.filter((term) => term.meddra_soc === category);
  }

  /**
   * Case-insensitive substring search over names, definitions and grade
   * descriptions. Each term appears once, in repository order.
   */
  searchTerms(query: string): TermRecord[] {
    const needle = query.toLowerCase();
    return this.terms.filter(
      (term) =>
        term.ctcae_term.toLowerCase().includes(needle) ||
        term.definition.toLowerCase().includes(needle) ||
        term.grades.some((grade) => grade.description.toLowerCase().includes(needle))
    );
  }
}
