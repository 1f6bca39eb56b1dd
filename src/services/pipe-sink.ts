/**
 * Writes a streaming session to plain output streams, for use in shell
 * pipelines. The response text goes to `out`; stderr output, exit codes and
 * tool errors go to `err`.
 */

import type {
  FileNameUpdate,
  SessionInfoEvent,
  StreamOutcome,
  ToolOutputEvent,
} from '../lib/stream-events.js';
import type { EventSink } from './event-sink.js';

/** The part of a writable stream the sink uses; process.stdout fits. */
export interface TextWriter {
  write(chunk: string): unknown;
}

export class PipeSink implements EventSink {
  constructor(
    private readonly out: TextWriter,
    private readonly err: TextWriter
  ) {}

  onText(text: string): void {
    this.out.write(text);
  }

  onToolInput(code: string): void {
    this.out.write(`\n\`\`\`python\n${code}\n\`\`\`\n`);
  }

  onToolOutput(output: ToolOutputEvent): void {
    if (output.stdout) {
      this.out.write(`\nOutput:\n${output.stdout}\n`);
    }
    if (output.stderr) {
      this.err.write(`\nError:\n${output.stderr}\n`);
    }
    if (output.exitCode !== 0) {
      this.err.write(`(Exit code: ${output.exitCode})\n`);
    }
    if (output.files.length > 0) {
      this.out.write('\nCreated files:\n');
      for (const file of output.files) {
        this.out.write(`  - ${file.displayName} (ID: ${file.id})\n`);
      }
    }
  }

  onToolError(errorCode: string): void {
    this.err.write(`\nCode execution error: ${errorCode}\n`);
  }

  onSessionInfo(_info: SessionInfoEvent): void {}

  onConnectionStatus(_status: string): void {}

  onFileResolved(_update: FileNameUpdate): void {}

  onStreamEnd(_outcome: StreamOutcome): void {
    this.out.write('\n');
  }
}
