/** Catalog products named in the text, in catalog order. */
export function detectProducts(text: string, catalog: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return catalog.filter((product) => lower.includes(product.toLowerCase()));
}

/**
 * Products implied by role keywords ("abap", "successfactors"), or the
 * unspecified marker when none is found.
 */
export function inferRoleProducts(
  text: string,
  roleKeywords: Readonly<Record<string, string>>,
  unspecified: string,
): string[] {
  const lower = text.toLowerCase();
  const products: string[] = [];
  for (const [keyword, product] of Object.entries(roleKeywords)) {
    if (lower.includes(keyword.toLowerCase()) && !products.includes(product)) products.push(product);
  }
  return products.length > 0 ? products : [unspecified];
}
