/** Closed set of value checks a tag can ask for. */
export type ValueValidator = "color";

export interface TagSpec {
  /** Whether `[tag=...]` may carry a value at all. */
  readonly allowValueAttr: boolean;
  readonly validator: ValueValidator | null;
}

// Keyword (letters only), #RGB or #RRGGBB
const COLOR_RE = /^(?:[A-Za-z]+|#[0-9A-Fa-f]{3}(?:[0-9A-Fa-f]{3})?)$/;

export function isValidColorValue(value: string): boolean {
  return COLOR_RE.test(value.trim());
}

export function runValidator(validator: ValueValidator, value: string): boolean {
  switch (validator) {
    case "color":
      return isValidColorValue(value);
  }
}

const simple = (): TagSpec => Object.freeze({ allowValueAttr: false, validator: null });

/*
 * Adding a tag means adding one entry here with its own value policy;
 * the renderer then needs a matching case.
 */
const TAG_REGISTRY: ReadonlyMap<string, TagSpec> = new Map<string, TagSpec>([
  ["b", simple()],
  ["i", simple()],
  ["color", Object.freeze<TagSpec>({ allowValueAttr: true, validator: "color" })]
]);

export function getTagSpec(name: string): TagSpec | undefined {
  return TAG_REGISTRY.get(name.toLowerCase());
}

/**
 * True when `value` may be attached to a tag governed by `spec`. The value
 * is checked as given; validators trim it themselves.
 */
export function acceptsValue(spec: TagSpec, value: string): boolean {
  if (!spec.allowValueAttr) return false;
  return spec.validator === null || runValidator(spec.validator, value);
}
