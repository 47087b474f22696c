import { Inject, Injectable } from "@nestjs/common";
import type {
  AgentDefinition,
  FragmentRegistry,
  RenderedPrompt,
  TemplateContext,
} from "@agentmd/types";
import { TemplateRendererService } from "@agentmd/templates";

export interface ComposePromptParams {
  definition: AgentDefinition;
  context: TemplateContext;
  modelName: string;
  fragments?: FragmentRegistry;
}

/**
 * Variables every prompt can reference. They take precedence over keys of
 * the same name in the caller's context.
 */
export const createBuiltinVariables = (
  definition: AgentDefinition,
  modelName: string,
): TemplateContext => ({
  agent_name: definition.name,
  agent_description: definition.description,
  model_name: modelName,
});

@Injectable()
export class PromptComposerService {
  constructor(
    @Inject(TemplateRendererService)
    private readonly renderer: TemplateRendererService,
  ) {}

  compose(params: ComposePromptParams): RenderedPrompt {
    const variables: TemplateContext = {
      ...params.context,
      ...createBuiltinVariables(params.definition, params.modelName),
    };

    return {
      system: this.renderer.render(
        params.definition.systemPromptTemplate,
        variables,
        params.fragments,
        { name: "System Prompt" },
      ),
      user: this.renderer.render(
        params.definition.userPromptTemplate,
        variables,
        params.fragments,
        { name: "User Prompt" },
      ),
    };
  }
}
