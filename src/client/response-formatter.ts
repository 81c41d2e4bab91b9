import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export interface ChartImage {
  data: string;
  mimeType: string;
}

export interface FormattedResponse {
  text: string;
  charts: ChartImage[];
  isError: boolean;
}

/**
 * Splits a tool result into display text and chart images. Content kinds
 * the chat cannot show are listed by type so nothing disappears silently.
 */
export function formatToolResponse(result: CallToolResult): FormattedResponse {
  const lines: string[] = [];
  const charts: ChartImage[] = [];

  for (const item of result.content) {
    if (item.type === 'text') {
      lines.push(item.text);
    } else if (item.type === 'image') {
      charts.push({ data: item.data, mimeType: item.mimeType });
    } else {
      lines.push(`[${item.type} content not shown]`);
    }
  }

  return {
    text: lines.join('\n').trim(),
    charts,
    isError: result.isError === true,
  };
}
