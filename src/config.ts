/**
 * Deposit configuration schema, validation and loading.
 *
 * The configuration is validated once, defaults are filled in, and the result
 * is frozen: nothing downstream mutates it during an assembly call.
 */

import { readFile } from "node:fs/promises";
import { z, type ZodIssue } from "zod";
import { DepositConfigError, type ConfigIssue } from "./errors.js";

/** Placeholders accepted by the article resource templates. */
export const ARTICLE_PLACEHOLDERS = ["doi", "manuscript", "volume", "version"] as const;

/** Placeholders accepted by the component resource template. */
export const COMPONENT_PLACEHOLDERS = ["doi", "manuscript", "volume", "id", "prefix"] as const;

/** Names of the `{name}` placeholders used in a template, in order of appearance. */
export function templatePlaceholders(template: string): string[] {
  return Array.from(template.matchAll(/\{(\w*)\}/g), (match) => match[1] ?? "");
}

function urlTemplate(allowed: readonly string[]) {
  return z
    .string()
    .superRefine((template, ctx) => {
      for (const name of templatePlaceholders(template)) {
        if (!allowed.includes(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown placeholder {${name}}; allowed: ${allowed.map((n) => `{${n}}`).join(", ")}`,
          });
        }
      }
    })
    .default("");
}

/**
 * Maps an article contributor type to the deposit contributor role.
 */
export const ContributorRoleSchema = z
  .object({
    contribType: z.string().min(1),
    role: z.string().min(1),
  })
  .strict();

export const DepositConfigSchema = z
  .object({
    /** Prefix of the batch id and of the output file name */
    batchFilePrefix: z.string().default("crossref-"),
    /** Name written into the generated-by comment */
    generator: z.string().default("crossref-deposit"),
    depositorName: z.string().default(""),
    emailAddress: z.string().default(""),
    registrant: z.string().default(""),
    /** Deposit schema version, e.g. "4.4.1" */
    schemaVersion: z
      .string()
      .regex(/^\d+\.\d+\.\d+$/, "Expected a dotted version such as 4.4.1")
      .default("4.4.1"),
    /** Article date types to try, in order, for the publication date */
    pubDateTypes: z.array(z.string().min(1)).default(["pub"]),
    /** Used to compute the volume when the article has none */
    yearOfFirstVolume: z.number().int().min(1).optional(),
    referenceDistributionOpts: z.string().default(""),
    doiPattern: urlTemplate(ARTICLE_PLACEHOLDERS),
    componentDoiPattern: urlTemplate(COMPONENT_PLACEHOLDERS),
    textMiningPdfPattern: urlTemplate(ARTICLE_PLACEHOLDERS),
    textMiningXmlPattern: urlTemplate(ARTICLE_PLACEHOLDERS),
    /** Derive component ids and prefixes from the component type */
    styledComponentDoi: z.boolean().default(false),
    componentLicenseRef: z.string().default(""),
    /** One access indicator license_ref is written per entry */
    accessIndicatorsAppliesTo: z.array(z.string().min(1)).default([]),
    archiveLocations: z.array(z.string().min(1)).default([]),
    /** Convert abstracts to JATS tags; when false inline tags are stripped */
    jatsAbstract: z.boolean().default(true),
    /** Keep face markup (<i>, <b>, ...) in titles and unstructured citations */
    faceMarkup: z.boolean().default(false),
    /** Write the article elocation id as the article number */
    elocationId: z.boolean().default(true),
    contributorRoles: z
      .array(ContributorRoleSchema)
      .default([{ contribType: "author", role: "author" }]),
  })
  .strict();

export type DepositConfig = z.infer<typeof DepositConfigSchema>;
export type DepositConfigInput = z.input<typeof DepositConfigSchema>;
export type ContributorRole = z.infer<typeof ContributorRoleSchema>;

function toIssue(issue: ZodIssue): ConfigIssue {
  return { path: issue.path.join("."), message: issue.message, code: issue.code };
}

function freeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    Object.values(value).forEach(freeze);
    Object.freeze(value);
  }
  return value;
}

export type DepositConfigResult =
  | { success: true; config: Readonly<DepositConfig> }
  | { success: false; error: DepositConfigError };

/** Validate a configuration without throwing. A valid config comes back frozen. */
export function validateDepositConfig(input: unknown = {}): DepositConfigResult {
  const result = DepositConfigSchema.safeParse(input);
  if (!result.success) {
    return { success: false, error: new DepositConfigError(result.error.issues.map(toIssue)) };
  }
  return { success: true, config: freeze(result.data) };
}

/**
 * Validate a raw configuration object and fill in defaults.
 *
 * @throws DepositConfigError if validation fails
 */
export function parseDepositConfig(input: unknown = {}): Readonly<DepositConfig> {
  const result = validateDepositConfig(input);
  if (!result.success) throw result.error;
  return result.config;
}

/** Read a JSON configuration file and validate it. */
export async function loadDepositConfig(path: string): Promise<Readonly<DepositConfig>> {
  const raw = await readFile(path, "utf-8");
  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DepositConfigError([{ path: "", message, code: "invalid_json" }], path);
  }
  const result = validateDepositConfig(input);
  if (!result.success) throw new DepositConfigError(result.error.issues, path);
  return result.config;
}
