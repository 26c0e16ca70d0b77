// services/catalogService.ts
import fetch from "node-fetch";
import pLimit from "p-limit";
import { setTimeout as sleep } from "node:timers/promises";
import { CatalogRequestError } from "./errors.js";
import { logger } from "../lib/logger.js";
import { errorMessage, isRecord } from "../lib/guards.js";

const MOUSER_BASE_URL = "https://api.mouser.com/api/v1";
const DEFAULT_MIN_INTERVAL_MS = 500;
const DEFAULT_KEYWORD_RECORDS = 50;

/* -----------------------------
   Types
----------------------------- */

interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<FetchResponse>;

export interface KeywordSearchOptions {
  records?: number;
  inStockOnly?: boolean;
}

// Raw part records, in the distributor's own shape.
export interface CatalogClient {
  searchByMpn(mpn: string): Promise<unknown[]>;
  searchKeyword(keyword: string, options?: KeywordSearchOptions): Promise<unknown[]>;
}

export interface MouserClientOptions {
  apiKey: string | null;
  baseUrl?: string;
  minIntervalMs?: number;
  fetch?: FetchLike;
}

/* -----------------------------
   Response parsing
----------------------------- */

function apiErrorMessage(errors: unknown[]): string {
  const messages = errors
    .map(e => (isRecord(e) && typeof e.Message === "string" ? e.Message : null))
    .filter((m): m is string => Boolean(m));
  return messages.length > 0 ? messages.join("; ") : "Unknown Mouser API error";
}

export function partsFromResponse(data: unknown, status: number): unknown[] {
  if (!isRecord(data)) {
    throw new CatalogRequestError("Mouser response is not a JSON object", status);
  }

  if (Array.isArray(data.Errors) && data.Errors.length > 0) {
    throw new CatalogRequestError(`Mouser API error: ${apiErrorMessage(data.Errors)}`, status);
  }

  const results = data.SearchResults;
  if (!isRecord(results)) {
    logger.warn("[mouser] response missing SearchResults");
    return [];
  }
  if (!Array.isArray(results.Parts)) {
    logger.warn("[mouser] response missing Parts in SearchResults");
    return [];
  }

  logger.debug("[mouser] search results", { count: results.NumberOfResult ?? results.Parts.length });
  return results.Parts;
}

/* -----------------------------
   Public API
----------------------------- */

export function createMouserClient(options: MouserClientOptions): CatalogClient {
  if (!options.apiKey) {
    throw new Error("MOUSER_API_KEY not set in environment");
  }
  const apiKey: string = options.apiKey;

  const baseUrl = (options.baseUrl ?? MOUSER_BASE_URL).replace(/\/+$/, "");
  const minIntervalMs = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
  const fetchImpl: FetchLike = options.fetch ?? fetch;

  // Requests run one at a time, at least minIntervalMs apart.
  const limit = pLimit(1);
  let lastRequestAt = 0;

  function schedule<T>(task: () => Promise<T>): Promise<T> {
    return limit(async () => {
      const wait = lastRequestAt + minIntervalMs - Date.now();
      if (wait > 0) await sleep(wait);
      lastRequestAt = Date.now();
      return task();
    });
  }

  async function post(endpoint: string, payload: object): Promise<unknown[]> {
    const url = `${baseUrl}/${endpoint}?apiKey=${encodeURIComponent(apiKey)}`;

    return schedule(async () => {
      logger.debug("[mouser] request", { endpoint });

      let response: FetchResponse;
      try {
        response = await fetchImpl(url, {
          method: "POST",
          headers: { "Content-Type": "application/json", Accept: "application/json" },
          body: JSON.stringify(payload)
        });
      } catch (err) {
        throw new CatalogRequestError(`Mouser request failed: ${errorMessage(err)}`, null);
      }

      if (!response.ok) {
        const body = await response.text();
        logger.error("[mouser] HTTP error", undefined, { endpoint, status: response.status, body });
        throw new CatalogRequestError(`Mouser error: ${response.status}`, response.status);
      }

      return partsFromResponse(await response.json(), response.status);
    });
  }

  return {
    async searchByMpn(mpn: string) {
      logger.info("[mouser] search by MPN", { mpn });
      return post("search/partnumber", {
        SearchByPartRequest: {
          mouserPartNumber: "",
          partNumber: mpn,
          partSearchOptions: "Exact"
        }
      });
    },

    async searchKeyword(keyword: string, searchOptions: KeywordSearchOptions = {}) {
      const inStockOnly = searchOptions.inStockOnly ?? false;
      logger.info("[mouser] search by keyword", { keyword, inStockOnly });
      return post("search/keyword", {
        SearchByKeywordRequest: {
          keyword,
          records: searchOptions.records ?? DEFAULT_KEYWORD_RECORDS,
          startingRecord: 0,
          searchOptions: inStockOnly ? "InStock" : "None",
          searchWithYourSignUpLanguage: "en"
        }
      });
    }
  };
}
