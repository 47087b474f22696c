import { Module } from "@nestjs/common";
import { createLoggerProvider } from "@agentmd/io";
import { FragmentRegistryLoader } from "./fragment-registry.loader";
import { TemplateRendererService } from "./template-renderer.service";

@Module({
  providers: [
    TemplateRendererService,
    FragmentRegistryLoader,
    createLoggerProvider("templates:fragments"),
  ],
  exports: [TemplateRendererService, FragmentRegistryLoader],
})
export class TemplateModule {}
