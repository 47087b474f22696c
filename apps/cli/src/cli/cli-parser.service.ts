import {
  CLI_BOOLEAN_OPTIONS_BY_FLAG,
  CLI_VALUE_OPTIONS_BY_FLAG,
  type CliOptionDefinition,
} from "@agentmd/config";
import { Injectable } from "@nestjs/common";
import type { CliArguments } from "./cli-arguments";

export class CliParseError extends Error {}

const isKnownFlag = (token: string): boolean =>
  CLI_VALUE_OPTIONS_BY_FLAG.has(token) || CLI_BOOLEAN_OPTIONS_BY_FLAG.has(token);

/** Splits `--flag=value` into its parts; other tokens pass through whole. */
const splitInlineValue = (token: string): [string, string | undefined] => {
  const separator = token.indexOf("=");
  if (!token.startsWith("--") || separator === -1) {
    return [token, undefined];
  }
  return [token.slice(0, separator), token.slice(separator + 1)];
};

const appendValue = (
  options: Record<string, unknown>,
  definition: CliOptionDefinition,
  value: string,
): void => {
  const existing = options[definition.runtimeKey];
  if (existing === undefined) {
    options[definition.runtimeKey] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    options[definition.runtimeKey] = [existing, value];
  }
};

/**
 * Parses `agentmd <command> [positionals] [options]`. Value options may repeat
 * and collect into a list; a value may start with `-` unless it is itself a
 * known flag.
 */
@Injectable()
export class CliParserService {
  parse(argv: string[]): CliArguments {
    const [command, ...rest] = argv;
    if (command === undefined) {
      throw new CliParseError("No command provided.");
    }
    if (!command || command.startsWith("-")) {
      throw new CliParseError(`Invalid command: ${command || "<empty>"}`);
    }

    const options: Record<string, unknown> = {};
    const positionals: string[] = [];
    const tokens = [...rest];

    for (let token = tokens.shift(); token !== undefined; token = tokens.shift()) {
      if (token === "--") {
        positionals.push(...tokens);
        break;
      }
      if (!token.startsWith("-") || token === "-") {
        positionals.push(token);
        continue;
      }

      const [flag, inline] = splitInlineValue(token);

      const booleanDefinition = CLI_BOOLEAN_OPTIONS_BY_FLAG.get(flag);
      if (booleanDefinition) {
        if (inline !== undefined) {
          throw new CliParseError(`Option ${flag} does not take a value.`);
        }
        options[booleanDefinition.runtimeKey] = true;
        continue;
      }

      const valueDefinition = CLI_VALUE_OPTIONS_BY_FLAG.get(flag);
      if (!valueDefinition) {
        throw new CliParseError(`Unknown option: ${flag}`);
      }

      const value = inline ?? tokens[0];
      if (value === undefined || (inline === undefined && isKnownFlag(value))) {
        throw new CliParseError(`Option ${flag} requires a value.`);
      }
      if (inline === undefined) {
        tokens.shift();
      }
      appendValue(options, valueDefinition, value);
    }

    return { command, options, positionals };
  }
}
