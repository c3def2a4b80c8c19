import { z } from 'zod';
import { htmlToText } from 'html-to-text';
import { CapabilityError } from '../../errors.js';
import type { ToolSpec } from '../types.js';

const schema = z.object({
  url: z.string().url(),
  maxChars: z.number().int().min(200).max(50_000).default(8_000),
});

export type Fetcher = (url: string, init: { signal?: AbortSignal }) => Promise<Response>;

export function createFetchUrlTool(fetcher: Fetcher = fetch): ToolSpec<typeof schema> {
  return {
    name: 'fetch_url',
    description: 'Fetch a web page and return its readable plain text (HTML stripped).',
    schema,
    parameters: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Absolute http(s) URL.' },
        maxChars: { type: 'integer', minimum: 200, maximum: 50_000 },
      },
      required: ['url'],
    },
    async run({ url, maxChars }, ctx) {
      const res = await fetcher(url, { signal: ctx.signal });
      if (!res.ok) throw new CapabilityError(`HTTP ${res.status} fetching ${url}`, { url, status: res.status });
      const body = await res.text();
      const type = res.headers.get('content-type') ?? '';
      const text = type.includes('html') ? htmlToText(body, { wordwrap: false }) : body;
      const title = (body.match(/<title>(.*?)<\/title>/i)?.[1] || '').trim();
      const head = title ? `Title: ${title}\n\n` : '';
      return `${head}${text.slice(0, maxChars)}`;
    },
  };
}
