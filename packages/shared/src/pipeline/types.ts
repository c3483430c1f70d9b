export type CorrelationId = string & { readonly __brand: "CorrelationId" };
