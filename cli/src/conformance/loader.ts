// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const CaseSchema = z
  .object({
    name: z.string().min(1, 'missing required field "name"'),
    query: z.string({ required_error: 'missing required field "query"' }),
    canonical: z.string().optional(),
    dict: z.unknown().optional(),
    error_position: z.number().int().min(0).optional(),
  })
  .refine(
    (c) => c.error_position === undefined || (c.canonical === undefined && c.dict === undefined),
    { message: "error_position cannot be combined with canonical or dict" },
  );

export type ConformanceCase = z.infer<typeof CaseSchema>;

export interface Suite {
  file: string;
  cases: ConformanceCase[];
}

/** Validate the YAML text of one suite: a list of cases. */
export function parseSuite(text: string, file: string): Suite {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${file}: YAML parse error: ${msg}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`${file}: expected a YAML array of test cases`);
  }

  const cases = parsed.map((raw: unknown, i) => {
    const result = CaseSchema.safeParse(raw);
    if (!result.success) {
      const label = typeof raw === "object" && raw !== null && "name" in raw ? ` (${String(raw.name)})` : "";
      throw new Error(`${file}: test case ${i}${label}: ${result.error.issues[0].message}`);
    }
    return result.data;
  });
  return { file, cases };
}

export function loadSuite(filePath: string): Suite {
  return parseSuite(fs.readFileSync(filePath, "utf-8"), path.basename(filePath));
}

export function loadAllSuites(suitesDir: string): Suite[] {
  if (!fs.existsSync(suitesDir)) {
    throw new Error(`Suites directory not found: ${suitesDir}`);
  }
  const files = fs.readdirSync(suitesDir)
    .filter(f => f.endsWith(".yaml") || f.endsWith(".yml"))
    .sort();
  if (files.length === 0) {
    throw new Error(`No suite files found in ${suitesDir}`);
  }
  return files.map(f => loadSuite(path.join(suitesDir, f)));
}
