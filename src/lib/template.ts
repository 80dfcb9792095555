"use strict";

type Bindings = Readonly<Record<string, string>>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Replaces every placeholder of `bindings` found in `template` in a single
 * pass. Inserted values are not scanned again, so a value may safely contain
 * text that looks like another placeholder.
 */
function render(template: string, bindings: Bindings): string {
  const keys = Object.keys(bindings).filter((k) => k.length > 0);
  if (!keys.length) return template;
  // longest first so that a placeholder never shadows a longer one it prefixes
  keys.sort((a, b) => b.length - a.length);
  const pattern = new RegExp(keys.map(escapeRegExp).join("|"), "g");
  return template.replace(pattern, (match) => bindings[match] ?? match);
}

export type { Bindings };
export { render };
