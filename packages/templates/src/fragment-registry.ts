import type { FragmentRegistry } from "@agentmd/types";

export type FragmentLookup = (name: string) => string | undefined;

const isMap = (
  registry: FragmentRegistry,
): registry is ReadonlyMap<string, string> => registry instanceof Map;

export const createFragmentLookup = (
  registry: FragmentRegistry | undefined,
): FragmentLookup => {
  if (!registry) {
    return () => undefined;
  }
  if (isMap(registry)) {
    return (name) => registry.get(name);
  }
  return (name) =>
    Object.prototype.hasOwnProperty.call(registry, name)
      ? registry[name]
      : undefined;
};
