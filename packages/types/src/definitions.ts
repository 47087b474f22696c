export type SchemaFormat = "yaml" | "json";

export interface EvolutionEntry {
  version: number;
  date: string | null;
  notes: string;
}

/**
 * A delimited body section of a definition document. `tag` carries the info
 * string of the fenced block the body was unwrapped from, if any.
 */
export interface DefinitionSection {
  label: string;
  tag: string | null;
  text: string;
  line: number;
}

export interface OutputSchemaSource {
  source: string;
  format: SchemaFormat;
  line: number;
}

export interface ContextBuilderSource {
  source: string;
  tag: string | null;
}

export interface AgentDefinition {
  readonly name: string;
  readonly description: string;
  /** Resolved against the provider registry at execution time. */
  readonly modelId: string | null;
  readonly temperature: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly evolutionEntries: readonly EvolutionEntry[];
  readonly latestVersion: number;
  readonly systemPromptTemplate: string;
  readonly userPromptTemplate: string;
  readonly outputSchemaSource: OutputSchemaSource | null;
  readonly contextBuilderSource: ContextBuilderSource | null;
  readonly extraSections: readonly DefinitionSection[];
  readonly sourceId: string | null;
  readonly sourceHash: string;
  readonly warnings: readonly string[];
}

export interface RenderedPrompt {
  system: string;
  user: string;
}

export type TemplateContext = Record<string, unknown>;

export type FragmentRegistry =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>;
