import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { TaxonomyDefinitionSchema, type TaxonomyDefinition } from "./schemas.js";
import { findClosestMatch } from "./similarity.js";

export const FUZZY_MATCH_CUTOFF = 0.4;

export type MainCategoryRow = {
  id: number;
  name: string;
};

export type SubCategoryRow = {
  id: number;
  mainCategoryId: number;
  name: string;
};

export type ResolvedCategory = {
  mainCategoryId: number;
  subCategoryId: number;
  category: string;
  subcategory: string;
  corrected: boolean;
};

/**
 * Two-level category model. Identifiers follow definition order starting at 1,
 * subcategory ids running across all categories.
 */
export class Taxonomy {
  private readonly mainRows: MainCategoryRow[] = [];
  private readonly subRows: SubCategoryRow[] = [];
  private readonly mainByName = new Map<string, MainCategoryRow>();
  private readonly subsByMainId = new Map<number, SubCategoryRow[]>();

  constructor(definition: TaxonomyDefinition) {
    const parsed = TaxonomyDefinitionSchema.parse(definition);

    for (const category of parsed.categories) {
      const main: MainCategoryRow = Object.freeze({
        id: this.mainRows.length + 1,
        name: category.name,
      });
      this.mainRows.push(main);
      this.mainByName.set(main.name, main);

      const subs = category.subcategories.map((name) => {
        const sub: SubCategoryRow = Object.freeze({
          id: this.subRows.length + 1,
          mainCategoryId: main.id,
          name,
        });
        this.subRows.push(sub);
        return sub;
      });
      this.subsByMainId.set(main.id, subs);
    }

    Object.freeze(this.mainRows);
    Object.freeze(this.subRows);
  }

  validate(category: string, subcategory: string): boolean {
    return this.findExact(category.trim(), subcategory.trim()) !== null;
  }

  resolve(category: string, subcategory: string): ResolvedCategory | null {
    const categoryName = category.trim();
    const subcategoryName = subcategory.trim();

    const exact = this.findExact(categoryName, subcategoryName);
    if (exact) {
      return exact;
    }

    const main = this.mainByName.get(categoryName);
    if (!main) {
      return null;
    }

    const candidates = this.subcategoriesOf(categoryName);
    const match = findClosestMatch(subcategoryName, candidates, FUZZY_MATCH_CUTOFF);
    if (!match) {
      return null;
    }

    const corrected = this.findExact(categoryName, match.candidate);
    return corrected ? { ...corrected, corrected: true } : null;
  }

  categories(): string[] {
    return this.mainRows.map((row) => row.name);
  }

  subcategoriesOf(category: string): string[] {
    const main = this.mainByName.get(category.trim());
    if (!main) {
      return [];
    }
    return (this.subsByMainId.get(main.id) ?? []).map((row) => row.name);
  }

  mainCategories(): readonly MainCategoryRow[] {
    return this.mainRows;
  }

  subCategories(): readonly SubCategoryRow[] {
    return this.subRows;
  }

  categoryName(mainCategoryId: number): string | undefined {
    return this.mainRows[mainCategoryId - 1]?.name;
  }

  subcategoryName(subCategoryId: number): string | undefined {
    return this.subRows[subCategoryId - 1]?.name;
  }

  toDefinition(): TaxonomyDefinition {
    return {
      categories: this.mainRows.map((main) => ({
        name: main.name,
        subcategories: this.subcategoriesOf(main.name),
      })),
    };
  }

  private findExact(category: string, subcategory: string): ResolvedCategory | null {
    const main = this.mainByName.get(category);
    if (!main) {
      return null;
    }

    const sub = this.subsByMainId.get(main.id)?.find((row) => row.name === subcategory);
    if (!sub) {
      return null;
    }

    return {
      mainCategoryId: main.id,
      subCategoryId: sub.id,
      category: main.name,
      subcategory: sub.name,
      corrected: false,
    };
  }
}

export function loadTaxonomy(path?: string): Taxonomy {
  const source = path ?? defaultTaxonomyPath();
  const raw: unknown = JSON.parse(readFileSync(source, "utf8"));
  return new Taxonomy(TaxonomyDefinitionSchema.parse(raw));
}

function defaultTaxonomyPath(): string {
  const require = createRequire(import.meta.url);
  return require.resolve("@receipt-ledger/contracts/taxonomy.json");
}
