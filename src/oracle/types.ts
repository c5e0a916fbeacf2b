/**
 * Oracle: the local language model, seen as a request/response box.
 */

export interface OracleRequest {
  system: string;
  prompt: string;
  /** JSON schema the reply must follow. */
  schema: Record<string, unknown>;
}

export interface Oracle {
  readonly name: string;
  /** Raw reply text. Throws OracleError when the model cannot be reached. */
  generate(request: OracleRequest, signal: AbortSignal): Promise<string>;
}
