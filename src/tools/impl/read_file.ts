import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';
import { ValidationError } from '../../errors.js';
import type { ToolSpec } from '../types.js';

const schema = z.object({
  path: z.string().min(1),
  maxBytes: z.number().int().min(1).max(2_000_000).default(100_000),
});

export function resolveInside(root: string, path: string): string {
  const base = resolve(root);
  const target = resolve(base, path);
  const rel = relative(base, target);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new ValidationError(`Path '${path}' is outside the workspace.`);
  }
  return target;
}

export function createReadFileTool(root: string): ToolSpec<typeof schema> {
  return {
    name: 'read_file',
    description: 'Read a text file from the workspace and return its first maxBytes bytes.',
    schema,
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Path relative to the workspace root.' },
        maxBytes: { type: 'integer', minimum: 1, maximum: 2_000_000 },
      },
      required: ['path'],
    },
    async run({ path, maxBytes }) {
      const buf = await readFile(resolveInside(root, path));
      const content = buf.toString('utf-8', 0, Math.min(maxBytes, buf.length));
      return buf.length > maxBytes ? `${content}\n[truncated: ${buf.length - maxBytes} more bytes]` : content;
    },
  };
}
