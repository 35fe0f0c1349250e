// Structural rewrites of a selector string. Best-effort: the target sites ship
// generated class names and ids that drift between deployments.

const TEST_ID_ATTRIBUTES = ['data-testid', 'data-qa', 'test-id', 'data-test'] as const;

const TEST_ID_PATTERN = /\[\s*(data-testid|data-test|data-qa|test-id)\s*[~|^$*]?=\s*['"]?([^'"\]]+)['"]?\s*\]/;

/** Alternatives for each selector, in generation order, without duplicates or originals */
export function generateAlternatives(selectors: readonly string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>(selectors);

  const push = (candidate: string) => {
    if (seen.has(candidate)) return;
    seen.add(candidate);
    out.push(candidate);
  };

  for (const raw of selectors) {
    const selector = raw.trim();

    if (selector.startsWith('#')) {
      const id = selector.slice(1);
      push(`[id='${id}']`);
      push(`*[id*='${id}']`);
      push(`input[id='${id}']`);
      push(`button[id='${id}']`);
      continue;
    }

    if (selector.startsWith('.')) {
      const className = selector.slice(1);
      push(`[class*='${className}']`);
      push(`*[class~='${className}']`);
      continue;
    }

    const testId = selector.match(TEST_ID_PATTERN);
    if (testId) {
      const [, attribute, value] = testId;
      for (const convention of TEST_ID_ATTRIBUTES) {
        if (convention !== attribute) push(`[${convention}='${value}']`);
      }
    }
  }

  return out;
}
