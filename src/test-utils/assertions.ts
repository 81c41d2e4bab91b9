import { expect } from 'vitest';
import type { ContentBlock, ToolResult } from '@/types/tools.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Validates that a base64 string decodes to PNG bytes
 */
export function expectPng(base64: string): void {
  const bytes = Buffer.from(base64, 'base64');
  expect(bytes.length).toBeGreaterThan(PNG_SIGNATURE.length);
  expect([...bytes.subarray(0, PNG_SIGNATURE.length)]).toEqual(PNG_SIGNATURE);
}

/**
 * Text of the only text block in a result
 */
export function textOf(result: ToolResult): string {
  const texts = result.content.filter(
    (block): block is Extract<ContentBlock, { type: 'text' }> => block.type === 'text'
  );
  expect(texts).toHaveLength(1);
  return texts[0]?.text ?? '';
}

/**
 * Validates a failed result and returns its error block
 */
export function expectToolError(result: ToolResult, kind: string, message?: string) {
  expect(result.isError).toBe(true);
  expect(result.content).toHaveLength(1);

  const [block] = result.content;
  expect(block?.type).toBe('error');
  if (block?.type !== 'error') {
    throw new Error('Expected an error block');
  }

  expect(block.kind).toBe(kind);
  if (message !== undefined) {
    expect(block.message).toBe(message);
  }
  return block;
}
