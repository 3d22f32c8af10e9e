/**
 * A line-oriented, request/response text service. Implementations may sit on
 * a child process, an in-process stream pair or a socket.
 */
export interface ILineTransport {
  /**
   * Write raw text; resolves once the text has been handed to the service
   */
  write(text: string): Promise<void>;

  /**
   * Next line without its terminator
   * @returns null once the service has closed its output
   */
  readLine(): Promise<string | null>;

  close(): Promise<void>;
}
