/**
 * Raw input → command strings
 */

export const START_BLOCK = '{';
export const END_BLOCK = '}';

export type Token =
  | { type: 'start-block' }
  | { type: 'end-block' }
  | { type: 'command'; text: string };

/**
 * Split on newlines and drop empty parts (consecutive separators collapse)
 */
export function splitCommands(data: string): string[] {
  return data.split('\n').filter(part => part.length > 0);
}

export function classify(part: string): Token {
  if (part === START_BLOCK) {
    return { type: 'start-block' };
  }
  if (part === END_BLOCK) {
    return { type: 'end-block' };
  }
  return { type: 'command', text: part };
}
