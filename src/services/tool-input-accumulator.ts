export type ToolInputResult =
  | { kind: 'code'; code: string }
  | { kind: 'empty' }
  | { kind: 'invalid'; reason: string; input: string };

/**
 * Reassembles the input of one code-execution tool call from input_json_delta
 * fragments. The fragments are only meaningful once the block closes; before
 * that they are usually not valid JSON on their own.
 */
export class ToolInputAccumulator {
  private fragments: string[] = [];
  private length = 0;
  private open = false;

  /**
   * Start collecting for a new tool block. Anything collected for a previous
   * block that never closed is discarded.
   */
  begin(): void {
    this.fragments = [];
    this.length = 0;
    this.open = true;
  }

  /**
   * Append a fragment. Returns false if no block is open.
   */
  append(partialJson: string): boolean {
    if (!this.open) return false;
    if (partialJson.length > 0) {
      this.fragments.push(partialJson);
      this.length += partialJson.length;
    }
    return true;
  }

  /**
   * Close the block and return the code it carried. Returns null if no block
   * was open.
   */
  finish(): ToolInputResult | null {
    if (!this.open) return null;
    const text = this.fragments.join('');
    this.fragments = [];
    this.length = 0;
    this.open = false;

    if (text.length === 0) return { kind: 'empty' };
    return extractCode(text);
  }

  get isOpen(): boolean {
    return this.open;
  }

  /** Characters collected so far for the open block. */
  get size(): number {
    return this.length;
  }
}

/**
 * Pull the `code` field out of a tool input JSON document.
 */
export function extractCode(json: string): ToolInputResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    return { kind: 'invalid', reason: `Invalid JSON: ${String(err)}`, input: json };
  }
  if (typeof parsed !== 'object' || parsed === null || !('code' in parsed)) {
    return { kind: 'invalid', reason: 'Missing code field', input: json };
  }
  if (typeof parsed.code !== 'string') {
    return { kind: 'invalid', reason: 'Code field is not a string', input: json };
  }
  return { kind: 'code', code: parsed.code };
}
