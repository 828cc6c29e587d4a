import { Position } from './tokenize/position';

// A ParseError describes the nature and position of a syntax error.
export class ParseError extends Error {
  readonly pos: Position;
  readonly msg: string;

  constructor(pos: Position, msg: string) {
    super(`${pos.toString()}: ${msg}`);
    this.name = 'ParseError';
    this.pos = pos;
    this.msg = msg;
  }
}
