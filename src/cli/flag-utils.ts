import { CliUsageError } from './errors.js';

/** Maps every accepted spelling of a flag to the option it sets. */
export type FlagAliases = Readonly<Record<string, string>>;

export interface FlagSpec {
  values?: FlagAliases;
  switches?: FlagAliases;
}

export interface ParsedFlags {
  values: Partial<Record<string, string>>;
  switches: Set<string>;
  /** Tokens no flag claimed, in their original order. */
  rest: string[];
}

export function parseFlags(args: readonly string[], spec: FlagSpec): ParsedFlags {
  const valueAliases = spec.values ?? {};
  const switchAliases = spec.switches ?? {};
  const parsed: ParsedFlags = { values: {}, switches: new Set(), rest: [] };

  for (let index = 0; index < args.length; index++) {
    const token = args[index] ?? '';
    const eq = token.startsWith('-') ? token.indexOf('=') : -1;
    const name = eq === -1 ? token : token.slice(0, eq);

    const switchOption = switchAliases[name];
    if (switchOption !== undefined && eq === -1) {
      parsed.switches.add(switchOption);
      continue;
    }

    const valueOption = valueAliases[name];
    if (valueOption === undefined) {
      parsed.rest.push(token);
      continue;
    }

    const value = eq === -1 ? args[++index] : token.slice(eq + 1);
    if (value === undefined) {
      throw new CliUsageError(`Flag '${name}' requires a value.`);
    }
    parsed.values[valueOption] = value;
  }

  return parsed;
}
