/**
 * Server-Sent Events frame assembler.
 *
 * The Messages API streams its response as text frames separated by a blank
 * line. Network chunks split those frames at arbitrary byte offsets, including
 * inside multi-byte characters, so bytes are decoded in streaming mode and text
 * is buffered until a separator arrives.
 *
 * Frame format:
 *   event: content_block_delta
 *   data: {"type":"content_block_delta",...}
 *   <blank line>
 */

const FRAME_SEPARATOR = '\n\n';

/**
 * Stateful frame splitter. Call feed() with each chunk and handle the frames it
 * returns in order.
 */
export class SseFrameAssembler {
  private decoder = new TextDecoder('utf-8');
  private buffer = '';
  // Buffer offset where the next separator search starts
  private scanFrom = 0;

  /**
   * Push a chunk of bytes and return every frame completed by it.
   */
  feed(chunk: Uint8Array): string[] {
    const text = this.decoder.decode(chunk, { stream: true });
    if (text.length === 0) {
      return [];
    }

    this.buffer += text;

    const frames: string[] = [];
    let start = 0;
    let idx: number;
    while ((idx = this.buffer.indexOf(FRAME_SEPARATOR, this.scanFrom)) !== -1) {
      frames.push(this.buffer.slice(start, idx));
      start = idx + FRAME_SEPARATOR.length;
      this.scanFrom = start;
    }

    if (start > 0) {
      this.buffer = this.buffer.slice(start);
    }
    // A separator can straddle this chunk and the next one
    this.scanFrom = Math.max(0, this.buffer.length - (FRAME_SEPARATOR.length - 1));

    return frames;
  }

  /**
   * End of stream. Flushes the decoder and discards any unterminated frame,
   * returning the number of characters dropped.
   */
  finish(): number {
    this.buffer += this.decoder.decode();
    const dropped = this.buffer.length;
    this.reset();
    return dropped;
  }

  reset(): void {
    this.decoder = new TextDecoder('utf-8');
    this.buffer = '';
    this.scanFrom = 0;
  }
}
