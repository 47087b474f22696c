import { Module } from "@nestjs/common";
import { SchemaCompilerService } from "./schema-compiler.service";
import { SchemaHandleCache } from "./schema-handle.cache";

@Module({
  providers: [SchemaCompilerService, SchemaHandleCache],
  exports: [SchemaCompilerService, SchemaHandleCache],
})
export class SchemasModule {}
