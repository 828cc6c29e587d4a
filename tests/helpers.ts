import * as assert from 'assert';

import { ParseError } from '../src/lua-parser/error';
import { ParseOptions, parse } from '../src/lua-parser/parse';
import * as syntax from '../src/lua-parser/syntax';
import { Random } from '../src/pipeline/random';
import { StepContext } from '../src/steps/step';
import { LogSink, Logger } from '../src/utils/logger';

export function parseOk(source: string, options: ParseOptions = {}): syntax.Chunk {
  const r = parse(source, options);
  if (r.err) {
    throw r.val;
  }
  return r.val;
}

export function parseErr(source: string, options: ParseOptions = {}): ParseError {
  const r = parse(source, options);
  if (r.ok) {
    assert.fail(`expected ${JSON.stringify(source)} not to parse`);
  }
  return r.val;
}

// expectNode narrows n with guard, failing the test on a different kind.
export function expectNode<T extends syntax.Node>(n: syntax.Node, guard: (n: syntax.Node) => n is T): T {
  if (!guard(n)) {
    assert.fail(`unexpected ${n.kind}`);
  }
  return n;
}

// A MemorySink keeps every line a logger writes.
export class MemorySink implements LogSink {
  readonly lines: string[] = [];

  error(line: string): void {
    this.lines.push(line);
  }

  warn(line: string): void {
    this.lines.push(line);
  }

  info(line: string): void {
    this.lines.push(line);
  }

  debug(line: string): void {
    this.lines.push(line);
  }
}

export function stepContext(seed: number, options: { pretty?: boolean; sink?: LogSink } = {}): StepContext {
  const random = new Random(seed);
  let counter = 0;
  return {
    random,
    logger: new Logger({ name: 'test', level: 'debug', sink: options.sink ?? new MemorySink() }),
    pretty: options.pretty ?? false,
    generateName: () => `name${counter++}`,
  };
}
