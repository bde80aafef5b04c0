import { z } from 'zod';
import type { ToolRegistry } from '../gateway/toolRegistry';
import { buildUrl, fetchJson, fetchText } from './httpClient';

export interface LiteratureProviderOptions {
  pubmedBaseUrl: string;
  ncbiApiKey?: string;
  tavilySearchUrl: string;
  /** Web search is only registered when a key is configured. */
  tavilyApiKey?: string;
}

const MAX_SNIPPET_CHARS = 300;

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string().default(''),
        content: z.string().default(''),
        score: z.number().optional(),
      }),
    )
    .default([]),
});

const esearchSchema = z.object({
  esearchresult: z.object({
    count: z.string().optional(),
    idlist: z.array(z.string()).default([]),
  }),
});

function clip(text: string, maxChars: number): string {
  const collapsed = text.split(/\s+/).join(' ').trim();
  return collapsed.length > maxChars ? `${collapsed.slice(0, maxChars - 3)}...` : collapsed;
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}

const pubmedDate = z
  .string()
  .trim()
  .regex(/^\d{4}(\/\d{2}(\/\d{2})?)?$/, 'expected YYYY, YYYY/MM or YYYY/MM/DD');

export function registerLiteratureTools(registry: ToolRegistry, options: LiteratureProviderOptions): void {
  const { tavilyApiKey } = options;
  if (tavilyApiKey) {
    registry.register({
      name: 'search_web',
      description: 'Search the web for a topic, question or keyword. Returns titles, source domains and short snippets.',
      provider: 'web',
      sideEffect: 'read_only',
      schema: z.object({
        query: z.string().trim().min(1).max(400),
        max_results: z.number().int().min(1).max(10).default(5),
      }),
      async execute({ query, max_results }, ctx) {
        const raw = await fetchJson(options.tavilySearchUrl, {
          method: 'POST',
          body: {
            api_key: tavilyApiKey,
            query,
            max_results,
            search_depth: 'basic',
            include_answer: false,
            include_raw_content: false,
            include_images: false,
          },
          signal: ctx.signal,
        });
        const { results } = tavilyResponseSchema.parse(raw);
        return {
          query,
          results: results.slice(0, max_results).map((result) => ({
            title: result.title || 'No title',
            source: hostOf(result.url),
            snippet: clip(result.content, MAX_SNIPPET_CHARS),
          })),
        };
      },
    });
  }

  registry.register({
    name: 'search_pubmed_abstracts',
    description:
      'Search PubMed and return article abstracts. Supports field tags such as [MeSH Terms] or [Title/Abstract] and AND/OR/NOT.',
    provider: 'pubmed',
    sideEffect: 'read_only',
    schema: z.object({
      term: z.string().trim().min(1).max(500),
      retmax: z.number().int().min(1).max(10).default(5),
      sort: z.enum(['relevance', 'pub_date']).default('relevance'),
      mindate: pubmedDate.optional(),
      maxdate: pubmedDate.optional(),
    }),
    async execute(args, ctx) {
      const common = { db: 'pubmed', api_key: options.ncbiApiKey || undefined };
      const search = esearchSchema.parse(
        await fetchJson(
          buildUrl(options.pubmedBaseUrl, '/esearch.fcgi', {
            ...common,
            term: args.term,
            retmax: args.retmax,
            sort: args.sort,
            retmode: 'json',
            mindate: args.mindate,
            maxdate: args.maxdate,
            datetype: args.mindate || args.maxdate ? 'pdat' : undefined,
          }),
          { signal: ctx.signal },
        ),
      );

      const ids = search.esearchresult.idlist;
      if (ids.length === 0) {
        return { term: args.term, pmids: [], abstracts: [] };
      }

      const text = await fetchText(
        buildUrl(options.pubmedBaseUrl, '/efetch.fcgi', {
          ...common,
          id: ids.join(','),
          rettype: 'abstract',
          retmode: 'text',
        }),
        { signal: ctx.signal },
      );

      return {
        term: args.term,
        pmids: ids,
        abstracts: text
          .trim()
          .split(/\n{3,}/)
          .map((article) => article.trim())
          .filter((article) => article.length > 0),
      };
    },
  });
}
