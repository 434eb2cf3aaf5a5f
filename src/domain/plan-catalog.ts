export type PlanCatalog = Readonly<Record<string, number>>;

export const DEFAULT_PLAN_CATALOG: PlanCatalog = {
  basic: 100,
  premium: 1000,
};

export function isKnownPlan(catalog: PlanCatalog, planReference: string): boolean {
  return Object.hasOwn(catalog, planReference);
}

export function creditUnitsForPlan(catalog: PlanCatalog, planReference: string): number | undefined {
  return isKnownPlan(catalog, planReference) ? catalog[planReference] : undefined;
}
