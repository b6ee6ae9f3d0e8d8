import { parseArgs } from "node:util";
import { z } from "zod";
import type { Language } from "../types";

export interface CliOptions {
  seed: number | null;
  language: Language;
  debug: boolean;
}

const CliOptionsSchema = z.object({
  seed: z.string().min(1).pipe(z.coerce.number().int().nonnegative()).optional(),
  lang: z.enum(["en", "ru"]).default("en"),
  debug: z.boolean().default(false)
});

export function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      seed: { type: "string" },
      lang: { type: "string" },
      debug: { type: "boolean" }
    },
    strict: true
  });
  const result = CliOptionsSchema.safeParse(values);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid options: ${detail}`);
  }
  return {
    seed: result.data.seed ?? null,
    language: result.data.lang,
    debug: result.data.debug
  };
}
