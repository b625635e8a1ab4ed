export type AnalysisMode = "summarize" | "classify";

export type PolicyStatus = "current" | "expired";

export type FindingPriority = "High" | "Medium" | "Low";

export interface PolicyFinding {
  issueType: "Outdated Policy" | "Outdated Content" | "Redundant Policy";
  description: string;
  suggestedAction: string;
  priority: FindingPriority;
}

export interface PolicyClassification {
  title: string;
  createdDate: string;
  updatedDate: string;
  expirationDate: string;
  version: string;
  keyTopics: string[];
  mainSections: string[];
  outdatedElements: string;
  summary: string;
  status: PolicyStatus;
  findings: PolicyFinding[];
}
