import { z } from 'zod';

import { SymbolId } from '../resolve/binding';
import * as syntax from '../lua-parser/syntax';
import { splice } from '../splice/splice';
import { luaNumber, luaString } from '../unparse/unparser';
import { Visit, visit } from '../walk/visit';
import { Step, StepContext, defineStep } from './step';

const settings = z
  .object({
    // share of constants moved into the array
    threshold: z.number().min(0).max(1).default(1),
    stringsOnly: z.boolean().default(false),
    shuffle: z.boolean().default(true),
    // store the array rotated and undo the rotation at run time
    rotate: z.boolean().default(true),
    encoding: z.enum(['none', 'base64']).default('base64'),
    // largest distance between an array index and the number written at
    // the call site
    maxWrapperOffset: z.number().int().min(0).default(65535),
  })
  .strict();

type Settings = z.output<typeof settings>;

type Constant = string | number;
type ConstantNode = syntax.StringExpression | syntax.NumberExpression;

export const base64Alphabet = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';

// encodeBase64 encodes the bytes of s with alphabet, without padding.
export function encodeBase64(s: string, alphabet: string): string {
  let out = '';
  let acc = 0;
  let bits = 0;
  for (let i = 0; i < s.length; i++) {
    acc = (acc << 8) | s.charCodeAt(i);
    bits += 8;
    while (bits >= 6) {
      bits -= 6;
      out += alphabet[(acc >> bits) & 63];
    }
    acc &= (1 << bits) - 1;
  }
  if (bits > 0) {
    out += alphabet[(acc << (6 - bits)) & 63];
  }
  return out;
}

// rotateRight moves the last k items to the front.
export function rotateRight<T>(items: readonly T[], k: number): T[] {
  const n = items.length;
  return [...items.slice(n - k), ...items.slice(0, n - k)];
}

const rotateFragment = (k: number, n: number): string => `
do
  local function reverse(i, j)
    while i < j do
      ARR[i], ARR[j] = ARR[j], ARR[i]
      i, j = i + 1, j - 1
    end
  end
  reverse(1, ${k})
  reverse(${k + 1}, ${n})
  reverse(1, ${n})
end
`;

const decodeFragment = (alphabet: string, n: number): string => `
do
  local byte, char, concat, floor = string.byte, string.char, table.concat, math.floor
  local alphabet = ${luaString(alphabet)}
  local lookup = {}
  for i = 1, 64 do
    lookup[byte(alphabet, i)] = i - 1
  end
  for i = 1, ${n} do
    local data = ARR[i]
    if type(data) == "string" then
      local parts = {}
      local acc, bits = 0, 0
      for j = 1, #data do
        local v = lookup[byte(data, j)]
        if v then
          acc = acc * 64 + v
          bits = bits + 6
          if bits >= 8 then
            bits = bits - 8
            local p = 2 ^ bits
            local b = floor(acc / p)
            parts[#parts + 1] = char(b)
            acc = acc - b * p
          end
        end
      end
      ARR[i] = concat(parts)
    end
  end
end
`;

// an __index handler that is never reached by the wrapper
const decoyFragment = (offset: number): string => `
do
  local offset = ${luaNumber(offset)}
  setmetatable(ARR, {
    __index = function(t, k)
      if type(k) == "number" then
        return rawget(t, k + offset)
      end
    end,
  })
end
`;

const wrapperFragment = (offset: number): string => `
local function WRAP(i)
  return ARR[i + ${luaNumber(offset)}]
end
`;

// ConstantArray moves string and number literals into one array
// declared at the start of the chunk and reads them back through a
// wrapper function.
export class ConstantArray implements Step {
  readonly name = 'ConstantArray';
  private readonly settings: Settings;

  constructor(s: Settings) {
    this.settings = s;
  }

  apply(chunk: syntax.Chunk, ctx: StepContext): void {
    const random = ctx.random;
    const constants: Constant[] = [];
    const known = new Map<string, number>();
    const selected = new Map<ConstantNode, number>();

    visit(chunk, {
      pre: (node) => {
        if (!this.isCandidate(node) || !random.chance(this.settings.threshold)) {
          return undefined;
        }
        const key = constantKey(node.value);
        let index = known.get(key);
        if (index === undefined) {
          index = constants.length;
          constants.push(node.value);
          known.set(key, index);
        }
        selected.set(node, index);
        return undefined;
      },
    });
    if (constants.length === 0) {
      ctx.logger.debug('no constants to move');
      return;
    }

    // order[p] is the constant stored at position p + 1
    const identity = constants.map((_, i) => i);
    const order = this.settings.shuffle ? random.shuffle(identity) : identity;
    const position: number[] = [];
    order.forEach((c, p) => {
      position[c] = p + 1;
    });
    const max = this.settings.maxWrapperOffset;
    const offset = random.int(-max, max);

    const root = chunk.body.scope;
    const arr = root.addVariable();
    const wrap = root.addVariable();

    visit(chunk, {
      post: (node, vctx) => {
        if (node.kind !== syntax.NodeKind.StringExpression && node.kind !== syntax.NodeKind.NumberExpression) {
          return undefined;
        }
        const index = selected.get(node);
        if (index === undefined) {
          return undefined;
        }
        vctx.scope.addReferenceToHigherScope(root, wrap);
        return Visit.replace(
          new syntax.FunctionCallExpression(
            new syntax.VariableExpression(root, wrap, syntax.NodeTags.generated),
            [new syntax.NumberExpression(position[index] - offset, syntax.NodeTags.generated)],
            syntax.NodeTags.generated
          )
        );
      },
    });

    let stored = order.map((c) => constants[c]);
    let alphabet = base64Alphabet;
    if (this.settings.encoding === 'base64') {
      alphabet = random.shuffle([...base64Alphabet]).join('');
      stored = stored.map((v) => (typeof v === 'string' ? encodeBase64(v, alphabet) : v));
    }
    const n = stored.length;
    const shift = this.settings.rotate && n > 1 ? random.int(1, n - 1) : 0;
    if (shift > 0) {
      stored = rotateRight(stored, shift);
    }

    chunk.body.statements.unshift(
      new syntax.LocalVariableDeclaration(root, [arr], [arrayLiteral(stored)], syntax.NodeTags.generated)
    );
    const imports = { ARR: { scope: root, id: arr } };
    const fragments: Array<[string, Record<string, SymbolId>]> = [];
    if (shift > 0) {
      fragments.push([rotateFragment(shift, n), {}]);
    }
    if (this.settings.encoding === 'base64') {
      fragments.push([decodeFragment(alphabet, n), {}]);
    }
    fragments.push([decoyFragment(offset), {}]);
    fragments.push([wrapperFragment(offset), { WRAP: wrap }]);

    let at = 1;
    for (const [source, exports] of fragments) {
      at += splice(chunk, chunk.body, source, { imports, exports, position: at, logger: ctx.logger }).length;
    }
    ctx.logger.debug(`moved ${selected.size} literals into an array of ${n}`, { offset, shift });
  }

  private isCandidate(node: syntax.Node): node is ConstantNode {
    if (node.kind !== syntax.NodeKind.StringExpression && node.kind !== syntax.NodeKind.NumberExpression) {
      return false;
    }
    if (node.hasTag(syntax.NodeTag.Generated) || node.hasTag(syntax.NodeTag.Exempt)) {
      return false;
    }
    return node.kind === syntax.NodeKind.StringExpression || !this.settings.stringsOnly;
  }
}

// constantKey tells apart values that Lua tells apart, -0 included.
function constantKey(v: Constant): string {
  if (typeof v === 'string') {
    return `s${v}`;
  }
  return Object.is(v, -0) ? 'n-0' : `n${v}`;
}

function arrayLiteral(values: Constant[]): syntax.TableConstructorExpression {
  return new syntax.TableConstructorExpression(
    values.map(
      (v) =>
        new syntax.TableEntry(
          typeof v === 'string'
            ? new syntax.StringExpression(v, syntax.NodeTags.generated)
            : new syntax.NumberExpression(v, syntax.NodeTags.generated),
          syntax.NodeTags.generated
        )
    ),
    syntax.NodeTags.generated
  );
}

export const constantArray = defineStep({
  name: 'ConstantArray',
  description: 'moves literals into a shared array read through a wrapper function',
  settings,
  create: (s) => new ConstantArray(s),
});
