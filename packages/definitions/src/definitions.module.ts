import { Module } from "@nestjs/common";
import { ConfigStore } from "@agentmd/config";
import { createLoggerProvider } from "@agentmd/io";
import { SchemasModule } from "@agentmd/schemas";
import { TemplateModule } from "@agentmd/templates";
import { DefinitionCatalogService } from "./definition-catalog.service";
import { DefinitionLinterService, type ModelCatalog } from "./definition-linter.service";
import { DefinitionParserService } from "./definition-parser.service";
import { FileSystemDocumentSource, type DocumentSource } from "./document-source";
import { DOCUMENT_SOURCE, MODEL_CATALOG } from "./definitions.tokens";

@Module({
  imports: [TemplateModule, SchemasModule],
  providers: [
    DefinitionParserService,
    DefinitionCatalogService,
    DefinitionLinterService,
    {
      provide: DOCUMENT_SOURCE,
      useFactory: (store: ConfigStore): DocumentSource =>
        new FileSystemDocumentSource(() => store.section("agents").directories),
      inject: [ConfigStore],
    },
    {
      provide: MODEL_CATALOG,
      useFactory: (store: ConfigStore): ModelCatalog => ({
        has: (modelId) =>
          store.section("providers").models.some((model) => model.id === modelId),
      }),
      inject: [ConfigStore],
    },
    createLoggerProvider("definitions:catalog"),
    createLoggerProvider("definitions:linter"),
  ],
  exports: [
    DefinitionParserService,
    DefinitionCatalogService,
    DefinitionLinterService,
    DOCUMENT_SOURCE,
  ],
})
export class DefinitionsModule {}
