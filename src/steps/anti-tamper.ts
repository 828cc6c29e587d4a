import { z } from 'zod';

import * as syntax from '../lua-parser/syntax';
import { splice } from '../splice/splice';
import { luaString } from '../unparse/unparser';
import { Step, StepContext, defineStep } from './step';

const settings = z
  .object({
    // also run the checks that need the debug library
    useDebug: z.boolean().default(true),
  })
  .strict();

type Settings = z.output<typeof settings>;

interface TamperCheck {
  guard: string;
  values: number[];
  sum: number;
  useDebug: boolean;
}

// The line hook check only passes while all of the program sits on one
// line, which is why the step refuses pretty printed output.
const debugChecks = `
  if debug and debug.sethook and debug.gethook then
    local sethook = debug.sethook
    local hook, mask, count = debug.gethook()
    local firstLine
    local calls = 0
    sethook(function(_, line)
      if not line then
        return
      end
      calls = calls + 1
      if firstLine == nil then
        firstLine = line
      elseif firstLine ~= line then
        valid = false
      end
    end, "l")
    ;(function() end)()
    ;(function() end)()
    sethook(hook, mask, count)
    if calls < 2 then
      valid = false
    end
  end
  if debug and debug.getinfo then
    local getinfo = debug.getinfo
    local natives = { pcall, tostring, string.char }
    for i = 1, #natives do
      if getinfo(natives[i], "S").what ~= "C" then
        valid = false
      end
    end
  end
`;

function fragment(check: TamperCheck): string {
  return `
do
  local valid = true
  local function kill()
    while true do
      error("Tamper Detected!")
    end
  end
  local guard = ${luaString(check.guard)}
  if rawget(_G, guard) ~= nil then
    kill()
  end
  rawset(_G, guard, true)
${check.useDebug ? debugChecks : ''}
  if pcall(function() error("") end) then
    valid = false
  end
  if select("#", pcall(function() return 1, 2 end)) ~= 3 then
    valid = false
  end
  local unpack = unpack or table.unpack
  local values = { ${check.values.join(', ')} }
  local sum = 0
  for _, v in ipairs({ unpack(values) }) do
    sum = sum + v
  end
  if sum ~= ${check.sum} then
    valid = false
  end
  rawset(_G, guard, nil)
  if not valid then
    kill()
  end
end
`;
}

// AntiTamper splices in a block that checks that the runtime has not
// been instrumented and stops the program with an error when it has.
export class AntiTamper implements Step {
  readonly name = 'AntiTamper';
  private readonly settings: Settings;

  constructor(s: Settings) {
    this.settings = s;
  }

  apply(chunk: syntax.Chunk, ctx: StepContext): void {
    if (ctx.pretty) {
      ctx.logger.warn('skipped: the checks do not hold for pretty printed output');
      return;
    }
    const values: number[] = [];
    const n = ctx.random.int(3, 8);
    for (let i = 0; i < n; i++) {
      values.push(ctx.random.int(1, 255));
    }
    const check: TamperCheck = {
      guard: ctx.generateName(12),
      values,
      sum: values.reduce((a, b) => a + b, 0),
      useDebug: this.settings.useDebug,
    };
    splice(chunk, chunk.body, fragment(check), { position: 'start', logger: ctx.logger });
  }
}

export const antiTamper = defineStep({
  name: 'AntiTamper',
  description: 'adds runtime checks against debugging and reformatting',
  settings,
  create: (s) => new AntiTamper(s),
});
