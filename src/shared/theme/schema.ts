// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme/schema`
 * Purpose: Runtime validation of ThemeConfig input using Zod.
 * Scope: Validates shape, color syntax and numeric ranges; returns the typed config. Does not resolve tokens.
 * Invariants: Throws ThemeConfigError listing every invalid path; unknown token keys and mistyped overrides are rejected.
 * Side-effects: none
 * Links: resolve.ts, components/kit/theme/ConfigProvider.tsx
 * @public
 */

import { z, ZodError } from "zod";

import { ThemeConfigError } from "@/shared/errors";

import { isColor } from "./color";
import { resolveToken } from "./resolve";
import { componentNames } from "./tokens";
import type { AliasToken, ThemeAlgorithm, ThemeConfig } from "./tokens";

const colorSchema = z
  .string()
  .refine(isColor, { message: "expected a hex or rgb() color" });
const pixelSchema = z.number().finite().nonnegative();

const seedShape = {
  colorPrimary: colorSchema,
  colorSuccess: colorSchema,
  colorWarning: colorSchema,
  colorError: colorSchema,
  colorInfo: colorSchema,
  colorTextBase: colorSchema,
  colorBgBase: colorSchema,
  fontFamily: z.string().min(1),
  fontFamilyCode: z.string().min(1),
  fontSize: z.number().int().min(8).max(64),
  borderRadius: pixelSchema,
  controlHeight: z.number().int().min(12),
  lineWidth: pixelSchema,
  sizeUnit: z.number().int().positive(),
  sizeStep: z.number().int().positive(),
  motion: z.boolean(),
};

// Derived tokens keep the value type of their default
const referenceToken: Readonly<Record<string, unknown>> = { ...resolveToken() };

const tokenSchema = z
  .object(seedShape)
  .partial()
  .catchall(z.union([z.string(), z.number().finite()]))
  .superRefine((token, ctx) => {
    for (const [key, value] of Object.entries(token)) {
      if (key in seedShape) continue;
      const expected = referenceToken[key];
      if (expected === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "unknown token",
        });
      } else if (typeof expected !== typeof value) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `expected ${typeof expected}`,
        });
      }
    }
  });

const algorithmSchema = z.custom<ThemeAlgorithm>(
  (value) => typeof value === "function",
  { message: "expected a theme algorithm function" }
);

const componentsSchema = z
  .object(
    Object.fromEntries(
      componentNames.map((name) => [name, tokenSchema.optional()])
    )
  )
  .strict();

const themeConfigSchema = z
  .object({
    token: tokenSchema.optional(),
    algorithm: z.union([algorithmSchema, z.array(algorithmSchema)]).optional(),
    components: componentsSchema.optional(),
  })
  .strict();

function isTokenOverride(
  token: Record<string, unknown>
): token is Partial<AliasToken> {
  return tokenSchema.safeParse(token).success;
}

/**
 * Validates unknown input as a ThemeConfig.
 * @throws ThemeConfigError with every invalid path
 */
export function parseThemeConfig(input: unknown): ThemeConfig {
  try {
    const parsed = themeConfigSchema.parse(input);
    const components: ThemeConfig["components"] = {};
    for (const name of componentNames) {
      const tokens = parsed.components?.[name];
      if (tokens && isTokenOverride(tokens)) components[name] = tokens;
    }
    return {
      ...(parsed.token && isTokenOverride(parsed.token)
        ? { token: parsed.token }
        : {}),
      ...(parsed.algorithm ? { algorithm: parsed.algorithm } : {}),
      ...(parsed.components ? { components } : {}),
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const invalid = new Set<string>();
      for (const issue of error.issues) {
        invalid.add(issue.path.length > 0 ? issue.path.join(".") : "(root)");
      }
      throw new ThemeConfigError({
        code: "INVALID_THEME_CONFIG",
        invalid: [...invalid],
      });
    }
    throw error;
  }
}
