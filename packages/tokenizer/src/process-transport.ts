import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { once } from "node:events";
import { createLogger } from "@lexalign/shared";
import { StreamTransport } from "./stream-transport";
import { TokenizerProtocolError } from "./errors";

const logger = createLogger("process-transport");

export interface IProcessTransportConfig {
  command: string;
  args?: string[];
  cwd?: string;
}

/**
 * Moses tokenizer invocation: no XML escaping, quiet, unbuffered, reading
 * from stdin.
 */
export function mosesTokenizerCommand(
  script: string,
  lang: string,
): IProcessTransportConfig {
  return {
    command: script,
    args: ["-l", lang, "-no-escape", "1", "-q", "-", "-b"],
  };
}

/**
 * Line transport to a long-lived child process over its stdin/stdout pipes.
 * The process is held open until `close()`.
 */
export class ProcessTransport extends StreamTransport {
  private readonly _child: ChildProcessWithoutNullStreams;
  private readonly _command: string;
  private _exited = false;

  static spawn({ command, args = [], cwd }: IProcessTransportConfig) {
    const child = spawn(command, args, { cwd, stdio: "pipe" });
    logger.info({ command, args, pid: child.pid }, "Spawned tokenizer");
    return new ProcessTransport(child, command);
  }

  private constructor(child: ChildProcessWithoutNullStreams, command: string) {
    super(child.stdin, child.stdout);
    this._child = child;
    this._command = command;

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      const message = chunk.trim();
      if (message) logger.warn({ command, stderr: message }, "Tokenizer stderr");
    });

    child.once("error", (error) => {
      this._exited = true;
      logger.error({ command, err: error }, "Tokenizer process failed");
    });

    child.once("exit", (code, signal) => {
      this._exited = true;
      logger.info({ command, code, signal }, "Tokenizer exited");
    });
  }

  get exited(): boolean {
    return this._exited;
  }

  write(text: string): Promise<void> {
    if (this._exited) {
      return Promise.reject(
        new TokenizerProtocolError(
          `Tokenizer process ${this._command} is not running`,
          { command: this._command },
        ),
      );
    }
    return super.write(text);
  }

  async close(): Promise<void> {
    if (this._exited) return;
    const exit = once(this._child, "exit");
    await super.close();
    this._child.kill();
    await exit;
  }
}
