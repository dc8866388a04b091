// This module provides the get_wikipedia_pages_json tool that returns plain-text article extracts.

import { z } from 'zod';
import { AppError } from '../../utils/errors.js';
import { defineTool, type ToolRegistryBuilder } from '../tool-registry.js';

export const WIKIPEDIA_PAGES_TOOL_NAME = 'get_wikipedia_pages_json';

const DEFAULT_LANGUAGE = 'en';
const DEFAULT_TIMEOUT_MS = 20_000;

export const wikipediaPagesSchema = z
  .object({
    title: z.string().min(1).describe("Wikipedia article title, e.g. 'Earth'."),
    language: z.string().optional().describe("Wikipedia language code, e.g. 'en'. Defaults to 'en'.")
  })
  .strict();

// Only the pages array is returned to callers; everything else in the API payload is dropped.
const wikipediaQueryResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(z.unknown())
    })
    .optional()
});

export interface WikipediaPagesToolOptions {
  timeoutMs?: number;
  userAgent?: string;
}

// This function normalizes one optional language code into a Wikipedia subdomain label.
export function resolveWikipediaLanguage(language: string | undefined): string {
  const normalized = language?.trim().toLowerCase();
  if (!normalized) {
    return DEFAULT_LANGUAGE;
  }

  if (!/^[a-z-]+$/.test(normalized)) {
    throw new AppError(400, 'validation_error', "`language` must be a valid Wikipedia language code, e.g. 'en'.");
  }

  return normalized;
}

// This function builds the MediaWiki query URL for plain-text extracts of one title.
export function buildWikipediaQueryUrl(title: string, language: string): string {
  const params = new URLSearchParams({
    action: 'query',
    prop: 'extracts',
    titles: title,
    explaintext: '1',
    redirects: '1',
    format: 'json',
    formatversion: '2'
  });

  return `https://${language}.wikipedia.org/w/api.php?${params.toString()}`;
}

// This function fetches the query.pages payload under a strict timeout.
export async function fetchWikipediaPages(url: string, options: Required<WikipediaPagesToolOptions>): Promise<unknown[]> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'GET',
      signal: controller.signal,
      headers: {
        Accept: 'application/json',
        'User-Agent': options.userAgent
      }
    }).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AppError(502, 'upstream_unreachable', `Wikipedia request failed: ${reason}.`);
    });

    if (!response.ok) {
      throw new AppError(502, 'upstream_http_error', `Wikipedia request failed with HTTP ${response.status}.`);
    }

    const payload: unknown = await response.json().catch(() => {
      throw new AppError(502, 'upstream_invalid_json', 'Wikipedia response was not valid JSON.');
    });

    const parsed = wikipediaQueryResponseSchema.safeParse(payload);
    if (!parsed.success || !parsed.data.query) {
      throw new AppError(
        502,
        'upstream_invalid_payload',
        'Wikipedia response did not include a valid `query.pages` payload.'
      );
    }

    return parsed.data.query.pages;
  } finally {
    clearTimeout(timeout);
  }
}

// This function registers the Wikipedia extract tool.
export function registerWikipediaPagesTool(builder: ToolRegistryBuilder, options: WikipediaPagesToolOptions = {}): void {
  const resolvedOptions: Required<WikipediaPagesToolOptions> = {
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    userAgent: options.userAgent ?? 'locale-time-mcp/0.1'
  };

  builder.register(
    defineTool({
      name: WIKIPEDIA_PAGES_TOOL_NAME,
      description: 'Fetch plain-text article content from Wikipedia and return only the API `query.pages` JSON payload.',
      inputSchema: wikipediaPagesSchema,
      handler: async (args, context) => {
        const title = args.title.trim();
        if (!title) {
          throw new AppError(400, 'validation_error', '`title` is required and must be a non-empty string.');
        }

        const language = resolveWikipediaLanguage(args.language);
        const url = buildWikipediaQueryUrl(title, language);
        context.logger.debug({ event: 'wikipedia_query_started', language, title }, 'wikipedia_query_started');

        const pages = await fetchWikipediaPages(url, resolvedOptions);

        return {
          content: [{ type: 'text', text: JSON.stringify(pages) }],
          structuredContent: { pages },
          isError: false
        };
      }
    })
  );
}
