import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';

/**
 * Counts tokens in decoded text. The pipeline never inspects the tokens themselves.
 */
export interface Tokenizer {
  count(text: string): number;
}

export class TiktokenTokenizer implements Tokenizer {
  private readonly encoder: Tiktoken;

  constructor(encoding: TiktokenEncoding = 'cl100k_base') {
    this.encoder = getEncoding(encoding);
  }

  count(text: string): number {
    // Special-token strings are encoded as ordinary text rather than rejected.
    return this.encoder.encode(text, [], []).length;
  }
}
