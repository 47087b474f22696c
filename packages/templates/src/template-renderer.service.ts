import { Injectable } from "@nestjs/common";
import nunjucks from "nunjucks";
import {
  TemplateRenderError,
  TemplateResolutionError,
  type FragmentRegistry,
  type TemplateContext,
} from "@agentmd/types";
import { createFragmentLookup, type FragmentLookup } from "./fragment-registry";

export interface RenderOptions {
  /** Label used in syntax error messages. */
  name?: string;
}

/**
 * Loader over a caller-supplied fragment registry. Lookups that miss are
 * recorded so the renderer can report the first unresolved fragment.
 */
class FragmentLoader implements nunjucks.ILoader {
  readonly missing: string[] = [];
  /** Compiled templates by name; nunjucks reads it before `getSource`. */
  cache: Record<string, nunjucks.Template> = Object.create(null);

  constructor(private readonly lookup: FragmentLookup) {}

  /** Nunjucks installs a plain `{}` cache, which resolves `toString` and friends. */
  resetCache(): void {
    this.cache = Object.create(null);
  }

  getSource(name: string): nunjucks.LoaderSource {
    const src = this.lookup(name);
    if (src === undefined) {
      this.missing.push(name);
      throw new Error(`template not found: ${name}`);
    }
    return { src, path: name, noCache: true };
  }
}

@Injectable()
export class TemplateRendererService {
  /**
   * Renders `template` against `context`. Includes resolve only through
   * `fragments`; nothing is read from storage and no state survives the call.
   */
  render(
    template: string,
    context: TemplateContext = {},
    fragments?: FragmentRegistry,
    options: RenderOptions = {},
  ): string {
    if (template.length === 0) {
      return "";
    }

    const loader = new FragmentLoader(createFragmentLookup(fragments));
    const env = this.createEnvironment(loader);

    try {
      const compiled = this.createTemplate(template, env, options.name);
      return compiled.render(context) ?? "";
    } catch (error) {
      const [missing] = loader.missing;
      if (missing !== undefined) {
        throw new TemplateResolutionError(missing);
      }
      throw this.toRenderError(error, options.name);
    }
  }

  /**
   * Compiles `template` without rendering it. Fragments are not resolved.
   */
  check(template: string, options: RenderOptions = {}): void {
    const env = this.createEnvironment(
      new FragmentLoader(createFragmentLookup(undefined)),
    );
    try {
      this.createTemplate(template, env, options.name);
    } catch (error) {
      throw this.toRenderError(error, options.name);
    }
  }

  private createEnvironment(loader: FragmentLoader): nunjucks.Environment {
    const env = new nunjucks.Environment(loader, {
      autoescape: false,
      throwOnUndefined: false,
    });
    loader.resetCache();
    return env;
  }

  private createTemplate(
    source: string,
    env: nunjucks.Environment,
    name?: string,
  ): nunjucks.Template {
    return new nunjucks.Template(source, env, name, true);
  }

  private toRenderError(error: unknown, name?: string): TemplateRenderError {
    const detail = error instanceof Error ? error.message : String(error);
    const label = name ? `Template "${name}"` : "Template";
    return new TemplateRenderError(`${label} failed to render: ${detail}`, {
      cause: error,
    });
  }
}
