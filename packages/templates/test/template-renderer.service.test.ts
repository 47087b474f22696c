import { describe, expect, it } from "vitest";
import { TemplateRenderError, TemplateResolutionError } from "@agentmd/types";
import { TemplateRendererService } from "../src/template-renderer.service";

describe("TemplateRendererService", () => {
  const service = new TemplateRendererService();

  it("substitutes variables and evaluates conditionals", () => {
    const template =
      "Hello {{ name }}.{% if urgent %} Act now.{% else %} No rush.{% endif %}";

    expect(service.render(template, { name: "Ada", urgent: true })).toBe(
      "Hello Ada. Act now.",
    );
    expect(service.render(template, { name: "Ada", urgent: false })).toBe(
      "Hello Ada. No rush.",
    );
  });

  it("renders undefined variables as empty text", () => {
    expect(service.render("[{{ missing }}|{{ user.name }}]", {})).toBe("[|]");
  });

  it("does not escape markup", () => {
    expect(service.render("{{ html }}", { html: "<b>&</b>" })).toBe("<b>&</b>");
  });

  it("returns literal text unchanged", () => {
    const literal = "Plain text\n  with indentation and trailing space \n";

    expect(service.render(literal, { ignored: 1 })).toBe(literal);
    expect(service.render("", {})).toBe("");
  });

  it("resolves includes from a map registry", () => {
    const fragments = new Map([
      ["footer", "-- {{ name }}"],
      ["wrapper", "[{% include 'footer' %}]"],
    ]);

    expect(
      service.render("Body {% include 'wrapper' %}", { name: "Ada" }, fragments),
    ).toBe("Body [-- Ada]");
  });

  it("resolves includes from a plain record registry", () => {
    expect(
      service.render('{% include "greeting" %}!', { who: "team" }, {
        greeting: "hi {{ who }}",
      }),
    ).toBe("hi team!");
  });

  it("fails with the fragment name when an include cannot be resolved", () => {
    let caught: unknown;
    try {
      service.render("{% include 'footer' %}", {}, new Map());
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TemplateResolutionError);
    expect(caught instanceof TemplateResolutionError && caught.fragment).toBe(
      "footer",
    );
  });

  it.each(["toString", "valueOf", "constructor", "hasOwnProperty"])(
    "reports a missing fragment named %s as unresolved",
    (name) => {
      let caught: unknown;
      try {
        service.render(`{% include '${name}' %}`, {}, {});
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TemplateResolutionError);
      expect(caught instanceof TemplateResolutionError && caught.fragment).toBe(name);
    },
  );

  it("includes fragments whose names shadow object built-ins", () => {
    const fragments = new Map([
      ["toString", "first"],
      ["constructor", "second"],
    ]);

    expect(
      service.render("{% include 'toString' %} {% include 'constructor' %}", {}, fragments),
    ).toBe("first second");
  });

  it("reports syntax errors as render errors", () => {
    expect(() =>
      service.render("{% if open %}never closed", {}, undefined, {
        name: "system_prompt",
      }),
    ).toThrow(TemplateRenderError);
    expect(() =>
      service.render("{% if open %}never closed", {}, undefined, {
        name: "system_prompt",
      }),
    ).toThrow(/^Template "system_prompt" failed to render: /);
  });

  it("renders the same output for the same inputs", () => {
    const fragments = { part: "{{ n }}" };
    const first = service.render("{% include 'part' %}-{{ n }}", { n: 3 }, fragments);
    const second = service.render("{% include 'part' %}-{{ n }}", { n: 3 }, fragments);

    expect(first).toBe("3-3");
    expect(second).toBe(first);
  });

  it("checks syntax without resolving fragments", () => {
    expect(() => service.check("{% include 'later' %}{{ ok }}")).not.toThrow();
    expect(() => service.check("{{ broken ")).toThrow(TemplateRenderError);
  });
});
