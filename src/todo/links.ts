import { HandlerDispatchError } from './errors.js';
import type { Span, TodoFile } from './model.js';

/**
 * Link listing and dispatch.
 *
 * Links are numbered in document order (0-based) across all headings and entries,
 * including links nested inside styled or unterminated spans.
 */
export interface LinkRef {
  index: number;
  heading: string;
  name: string;
  handler: string;
  known: boolean;
  path: string;
}

/** Opens a link path. Implementations live outside the format core. */
export type LinkHandler = (path: string) => Promise<void>;

export type LinkHandlerRegistry = ReadonlyMap<string, LinkHandler>;

function collectFromSpans(spans: Span[], heading: string, out: LinkRef[]): void {
  for (const span of spans) {
    if (span.kind === 'normal') continue;
    if (span.kind === 'link') {
      out.push({
        index: out.length,
        heading,
        name: span.name,
        handler: span.handler.name,
        known: span.handler.kind === 'known',
        path: span.path,
      });
      continue;
    }
    collectFromSpans(span.children, heading, out);
  }
}

export function collectLinks(file: TodoFile): LinkRef[] {
  const out: LinkRef[] = [];
  for (const heading of file.headings) {
    for (const entry of heading.body) {
      collectFromSpans(entry.type === 'todo' ? entry.description : entry.text, heading.name, out);
    }
  }
  return out;
}

export function formatLinkList(links: LinkRef[]): string {
  return links.map((link) => `${link.index} ${link.name} - ${link.handler}:${link.path}`).join('\n');
}

/**
 * Invoke the registered handler for a link.
 *
 * Throws `HandlerDispatchError` when the handler is not registered or fails.
 */
export async function dispatchLink(
  link: { handler: string; path: string },
  registry: LinkHandlerRegistry
): Promise<void> {
  const handler = registry.get(link.handler);
  if (!handler) {
    throw new HandlerDispatchError(
      'UNKNOWN_HANDLER',
      link.handler,
      `Unknown link handler: ${JSON.stringify(link.handler)}`
    );
  }

  try {
    await handler(link.path);
  } catch (error) {
    throw new HandlerDispatchError(
      'HANDLER_FAILED',
      link.handler,
      `Link handler ${JSON.stringify(link.handler)} failed: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { cause: error }
    );
  }
}
