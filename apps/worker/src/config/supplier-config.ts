import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_SUCCESS_MARKERS, isValidPattern } from '@supplier-watch/extractor';
import type { ExtractionRule, SupplierConfig } from '@supplier-watch/shared';

/** Injection token for the parsed {@link SupplierConfig} */
export const SUPPLIER_CONFIG = Symbol('SUPPLIER_CONFIG');

const pattern = z
  .string()
  .min(1)
  .refine(isValidPattern, (value) => ({ message: `Invalid regular expression: ${value}` }));

const extractionRuleSchema = z.object({
  selector: z.string().min(1).optional(),
  regex: pattern.optional(),
  regex_full_html: pattern.optional(),
});

const priceRuleSchema = extractionRuleSchema.extend({
  locale: z.string().min(2).optional(),
});

const productSchema = z.object({
  url: z.string().url(),
  name: z.string().optional(),
  price: priceRuleSchema.nullish(),
  stock: extractionRuleSchema.nullish(),
});

const loginSchema = z.object({
  login_page: z.string().url(),
  post_url: z.string().url(),
  user_field: z.string().min(1),
  pass_field: z.string().min(1),
  success_markers: z.array(z.string().min(1)).default(DEFAULT_SUCCESS_MARKERS),
  failure_markers: z.array(z.string().min(1)).default([]),
  on_unconfirmed: z.enum(['continue', 'abort']).default('continue'),
});

export const supplierConfigSchema = z.object({
  label: z.string().min(1).default('Supplier'),
  login: loginSchema,
  products: z.array(productSchema).superRefine((products, ctx) => {
    const seen = new Set<string>();
    products.forEach((product, index) => {
      if (seen.has(product.url)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'url'],
          message: `Duplicate product URL: ${product.url}`,
        });
      }
      seen.add(product.url);
    });
  }),
});

type RawExtractionRule = z.infer<typeof extractionRuleSchema>;

function toExtractionRule(raw: RawExtractionRule | null | undefined): ExtractionRule {
  return {
    selector: raw?.selector,
    selectorRegex: raw?.regex,
    fallbackRegex: raw?.regex_full_html,
  };
}

/**
 * Validate a parsed configuration document and map it to domain types
 */
export function parseSupplierConfig(raw: unknown): SupplierConfig {
  const result = supplierConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Supplier config validation failed:\n${errors}`);
  }

  const { label, login, products } = result.data;

  return {
    label,
    login: {
      loginPage: login.login_page,
      postUrl: login.post_url,
      userField: login.user_field,
      passField: login.pass_field,
      successMarkers: login.success_markers,
      failureMarkers: login.failure_markers,
      onUnconfirmed: login.on_unconfirmed,
    },
    products: products.map((product) => ({
      url: product.url,
      name: product.name || product.url,
      price: toExtractionRule(product.price),
      stock: toExtractionRule(product.stock),
      priceLocale: product.price?.locale,
    })),
  };
}

/**
 * Read and validate the supplier configuration file.
 * `.yaml` and `.yml` files are read as YAML, anything else as JSON.
 */
export async function loadSupplierConfig(path: string): Promise<SupplierConfig> {
  const content = await readFile(path, 'utf-8');
  const extension = extname(path).toLowerCase();
  const format = extension === '.yaml' || extension === '.yml' ? 'YAML' : 'JSON';

  let raw: unknown;
  try {
    raw = format === 'YAML' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Supplier config ${path} is not valid ${format}: ${message}`);
  }

  return parseSupplierConfig(raw);
}
