export interface CliArguments {
  command: string;
  options: Record<string, unknown>;
  positionals: string[];
}
