export * as clinicalHistory from "./clinical-history"
