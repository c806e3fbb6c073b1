export interface Invocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly cwd: string;
}

export interface InvocationInput {
  readonly command: string;
  readonly args?: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
}

export function createInvocation(input: InvocationInput): Invocation {
  if (input.command.trim().length === 0) {
    throw new TypeError("Invocation command must be a non-empty string");
  }

  return Object.freeze({
    command: input.command,
    args: Object.freeze([...(input.args ?? [])]),
    env: Object.freeze({ ...input.env }),
    cwd: input.cwd ?? process.cwd(),
  });
}

const SAFE_ARG_REGEX = /^[\w@%+=:,./-]+$/;

/** Shell-style rendering of the command line, for diagnostics only. */
export function formatCommandLine(invocation: Pick<Invocation, "command" | "args">): string {
  return [invocation.command, ...invocation.args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
  if (SAFE_ARG_REGEX.test(arg)) return arg;
  return "'" + arg.replaceAll("'", String.raw`'\''`) + "'";
}
