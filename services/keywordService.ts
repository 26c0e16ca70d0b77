// services/keywordService.ts
import { GoogleGenAI } from "@google/genai";
import type { ConsolidatedLineItem } from "../types.js";
import { logger } from "../lib/logger.js";
import { errorMessage, isRecord } from "../lib/guards.js";

const MAX_KEYWORD_TOKENS = 5;

/* -----------------------------
   Types
----------------------------- */

export interface KeywordModel {
  generateText(prompt: string): Promise<string>;
}

export interface KeywordGenerator {
  generateBatch(lineItems: readonly ConsolidatedLineItem[]): Promise<Map<number, string>>;
}

/* -----------------------------
   Deterministic fallback
----------------------------- */

function packageToken(pkg: string | undefined): string | undefined {
  if (!pkg) return undefined;
  return /\b(\d{4})\b/.exec(pkg)?.[1] ?? pkg.trim();
}

/**
 * Search keyword built from the line item alone: value, package size code
 * and the first three words of the description, at most five tokens.
 * Falls back to the MPN when none of those are present.
 */
export function suggestKeyword(lineItem: ConsolidatedLineItem): string {
  const { fields } = lineItem;
  const descriptionWords = (fields.description ?? "").split(/\s+/).slice(0, 3);

  const seen = new Set<string>();
  const tokens: string[] = [];
  for (const part of [fields.value, packageToken(fields.package), ...descriptionWords]) {
    for (const token of (part ?? "").split(/\s+/)) {
      const key = token.toLowerCase();
      if (!token || seen.has(key)) continue;
      seen.add(key);
      tokens.push(token);
    }
  }

  if (tokens.length === 0) return fields.mpn ?? "";
  return tokens.slice(0, MAX_KEYWORD_TOKENS).join(" ");
}

/* -----------------------------
   Model output parsing
----------------------------- */

/**
 * Pulls the first JSON object out of a model reply. Handles code fences and
 * prose around the object.
 */
export function extractJson(text: string): unknown {
  const cleaned = (text ?? "").replace(/^\uFEFF/, "").trim();
  if (!cleaned) {
    throw new Error("Empty model response text");
  }

  if (cleaned.startsWith("```")) {
    const lines = cleaned.split("\n");
    if (lines.length >= 3) {
      const stripped = lines.slice(1, -1).join("\n").trim();
      try {
        return JSON.parse(stripped);
      } catch (err) {
        logger.debug("[keywords] fenced reply is not plain JSON", { error: errorMessage(err) });
      }
    }
  }

  // Balanced-brace scan for the first complete {...}
  const start = cleaned.indexOf("{");
  if (start === -1) {
    throw new Error("No JSON object found in model response");
  }

  let depth = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < cleaned.length; i++) {
    const ch = cleaned[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") depth--;

    if (depth === 0 && i > start) {
      return JSON.parse(cleaned.slice(start, i + 1));
    }
  }

  throw new Error("Unterminated JSON object in model response");
}

function describeLineItem(lineItem: ConsolidatedLineItem): Record<string, string> {
  const described: Record<string, string> = {};
  for (const [field, value] of Object.entries(lineItem.fields)) {
    if (field !== "quantity" && value) described[field] = value;
  }
  return described;
}

function cleanKeyword(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const keyword = value.replace(/\s+/g, " ").trim();
  return keyword ? keyword : null;
}

/* -----------------------------
   Public API
----------------------------- */

export function createKeywordGenerator(options: { model: KeywordModel }): KeywordGenerator {
  const { model } = options;

  return {
    async generateBatch(lineItems) {
      const keywords = new Map<number, string>();
      if (lineItems.length === 0) return keywords;

      const components: Record<string, Record<string, string>> = {};
      for (const item of lineItems) components[String(item.id)] = describeLineItem(item);

      const prompt = `
You turn electronic components from a bill of materials into distributor search keywords.

Return STRICT JSON ONLY: an object mapping each component id to its keyword string.
- At most ${MAX_KEYWORD_TOKENS} words per keyword.
- Use the value, package size and component type. Never invent a manufacturer part number.

COMPONENTS (JSON, keyed by id):
${JSON.stringify(components, null, 2)}
`;

      let parsed: unknown = null;
      try {
        parsed = extractJson(await model.generateText(prompt));
      } catch (err) {
        logger.warn("[keywords] batch generation failed; using fallback", {
          count: lineItems.length,
          error: errorMessage(err)
        });
      }

      for (const item of lineItems) {
        const keyword = isRecord(parsed) ? cleanKeyword(parsed[String(item.id)]) : null;
        keywords.set(item.id, keyword ?? suggestKeyword(item));
      }
      return keywords;
    }
  };
}

export function createGeminiModel(options: { apiKey: string | null; model: string }): KeywordModel {
  if (!options.apiKey) {
    throw new Error("GEMINI_API_KEY not set in environment");
  }

  const client = new GoogleGenAI({ apiKey: options.apiKey });
  const model = options.model;

  return {
    async generateText(prompt: string) {
      const result = await client.models.generateContent({
        model,
        contents: [
          {
            role: "user",
            parts: [{ text: prompt }]
          }
        ]
      });
      return result.text ?? "";
    }
  };
}
