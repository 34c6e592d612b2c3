import { z } from "zod";
import defaultTemplateFile from "@/data/query-templates.json";
import { executeWithRetry, isTransientDbError } from "./retry";
import type { SqlRunner } from "./types";

export type QueryTemplate = {
  key: string;
  sql: string;
  origin: "default" | "registry";
};

const TemplateFileSchema = z.object({
  templates: z.record(
    z.object({
      description: z.string().optional(),
      sql: z.union([z.string(), z.array(z.string())]),
    })
  ),
});

const RegistryRowSchema = z.object({
  template_key: z.string().min(1),
  sql_text: z.string().min(1),
});

export class TemplateRegistry {
  private readonly templates: ReadonlyMap<string, QueryTemplate>;

  constructor(templates: Iterable<QueryTemplate>) {
    this.templates = new Map([...templates].map((template) => [template.key, template]));
  }

  get(key: string): QueryTemplate | undefined {
    return this.templates.get(key);
  }

  keys(): string[] {
    return [...this.templates.keys()].sort();
  }

  /** Registry rows replace defaults with the same key and add new keys. */
  overlay(rows: { template_key: string; sql_text: string }[]): TemplateRegistry {
    const merged = new Map(this.templates);
    for (const row of rows) {
      merged.set(row.template_key, { key: row.template_key, sql: row.sql_text, origin: "registry" });
    }
    return new TemplateRegistry(merged.values());
  }
}

export function parseTemplateFile(input: unknown): TemplateRegistry {
  const file = TemplateFileSchema.parse(input);
  return new TemplateRegistry(
    Object.entries(file.templates).map(([key, entry]) => ({
      key,
      sql: Array.isArray(entry.sql) ? entry.sql.join("\n") : entry.sql,
      origin: "default" as const,
    }))
  );
}

export function defaultTemplateRegistry(): TemplateRegistry {
  return parseTemplateFile(defaultTemplateFile);
}

export const REGISTRY_TABLE_SQL = "SELECT template_key, sql_text FROM ub.query_templates";

/**
 * Loads the startup registry: bundled defaults overlaid with the registry table. When the
 * table cannot be read the defaults are used alone.
 */
export async function loadTemplateRegistry(runner: SqlRunner, options: { timeoutMs: number }): Promise<TemplateRegistry> {
  const defaults = defaultTemplateRegistry();
  try {
    const { rows } = await executeWithRetry(() => runner.query(REGISTRY_TABLE_SQL, [], options), {
      shouldRetry: isTransientDbError,
    });
    const parsed = z.array(RegistryRowSchema).safeParse(rows);
    if (!parsed.success) {
      console.warn("[TemplateRegistry] Registry rows malformed; using bundled templates", parsed.error.issues);
      return defaults;
    }
    console.log(`[TemplateRegistry] Loaded ${parsed.data.length} template(s) from ub.query_templates`);
    return defaults.overlay(parsed.data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[TemplateRegistry] Could not read ub.query_templates; using bundled templates: ${message}`);
    return defaults;
  }
}
