import { Inject, Injectable } from "@nestjs/common";
import {
  DOCUMENT_SOURCE,
  DefinitionLinterService,
  formatLintResults,
  hasErrors,
  type DocumentSource,
  type LintReport,
} from "@agentmd/definitions";
import type { CliArguments } from "../cli-arguments";
import { CliOptionsService } from "../cli-options.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

@Injectable()
export class ValidateCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "validate",
    description: "Lint agent definitions; exits non-zero when any has errors.",
    usage: "validate [name] [--format human|json|github]",
    aliases: ["lint"],
  };

  constructor(
    @Inject(DefinitionLinterService)
    private readonly linter: DefinitionLinterService,
    @Inject(DOCUMENT_SOURCE) private readonly source: DocumentSource,
    @Inject(CliOptionsService) private readonly optionsService: CliOptionsService,
  ) {}

  async execute(args: CliArguments): Promise<number> {
    const format = this.optionsService.lintFormat(args.options);
    const name = args.positionals[0];
    const reports = name
      ? [await this.lintOne(name)]
      : await this.linter.lintCatalog(this.source);

    console.log(formatLintResults(reports, format));
    return reports.some(hasErrors) ? 1 : 0;
  }

  private async lintOne(name: string): Promise<LintReport> {
    const document = await this.source.read(name);
    return this.linter.lintSource(name, document.text, document.location);
  }
}
