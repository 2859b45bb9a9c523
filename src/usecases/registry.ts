import type { RuleCategory } from "../types";

export interface UseCaseEntry {
  name: string;
  category: RuleCategory;
  remediation?: string;
  // false when the canned remediation is the whole answer and no narrative is requested
  narrative: boolean;
}

const RULE_CATEGORIES: readonly RuleCategory[] = ["Reconciliation", "Validation", "ProcessEvent"];

export const DEFAULT_USE_CASES: readonly UseCaseEntry[] = [
  {
    name: "CSV Upload Validation",
    category: "Validation",
    remediation: "Simple binary validation. System accepts or rejects the upload. No chatbot needed.",
    narrative: false
  },
  {
    name: "Duplicate Asset Detection",
    category: "Validation",
    remediation: "AI chatbot detects duplicates, alerts donor instantly, reduces manual cleanup.",
    narrative: true
  },
  {
    name: "Pickup Scheduling Confirmation",
    category: "ProcessEvent",
    remediation: "Bot reconciles scheduled assets vs CSV upload, alerts mismatch, prompts correction.",
    narrative: true
  },
  {
    name: "Donor Asset Data Validation",
    category: "Validation",
    remediation: "Bot can query donor to fill missing data or correct errors interactively.",
    narrative: true
  },
  {
    name: "Donation Commitment vs Actual Reconciliation",
    category: "Reconciliation",
    remediation: "Bot helps compare commitment vs upload and pickup, alerts donor or admin for mismatches.",
    narrative: true
  },
  {
    name: "Data Privacy Compliance",
    category: "ProcessEvent",
    remediation: "Bot verifies consent flags, requests missing consents interactively to ensure compliance.",
    narrative: true
  },
  {
    name: "Donation Tax Certificate Issuance",
    category: "ProcessEvent",
    remediation: "Bot auto-generates certificates, notifies donors, and tracks issuance status.",
    narrative: true
  },
  {
    name: "Asset Return or Cancellation Request",
    category: "ProcessEvent",
    remediation: "Bot manages cancellation workflows, approves or refers to admin, updates records.",
    narrative: true
  },
  {
    name: "Receiving Assets from Donor",
    category: "ProcessEvent",
    remediation: "Chatbot reconciles expected vs received assets and flags discrepancies for approval.",
    narrative: true
  },
  {
    name: "Partner Asset Classification",
    category: "ProcessEvent",
    remediation: "AI-powered image recognition bot suggests correct classification and reduces manual errors.",
    narrative: true
  },
  {
    name: "Rescheduling & Location Mismatch",
    category: "ProcessEvent",
    remediation: "Bot tracks schedules, alerts all parties, suggests new timings, and confirms.",
    narrative: true
  },
  {
    name: "Partner to Beneficiary Handoff",
    category: "ProcessEvent",
    remediation: "Bot records asset condition, confirms quantities, and alerts admin on discrepancies.",
    narrative: true
  },
  {
    name: "Multiple Pickups in Phases",
    category: "ProcessEvent",
    remediation: "Chatbot tracks phased pickups, aggregates data, and sends reminders for incomplete pickups.",
    narrative: true
  },
  {
    name: "Inventory Overstock Management",
    category: "ProcessEvent",
    remediation: "Bot detects overcapacity and suggests redistribution or pickup rescheduling.",
    narrative: true
  },
  {
    name: "Partner Skill/Capability Mismatch",
    category: "ProcessEvent",
    remediation: "Bot flags assets needing specialized handling and routes them to expert partners.",
    narrative: true
  },
  {
    name: "Partner Non-compliance or SLA Breach",
    category: "ProcessEvent",
    remediation: "Bot monitors SLA data, sends warnings, and escalates persistent issues.",
    narrative: true
  },
  {
    name: "Receipt Confirmation",
    category: "ProcessEvent",
    remediation: "Bot prompts for receipt confirmation and sends reminders until acknowledged.",
    narrative: true
  },
  {
    name: "Device Condition Feedback",
    category: "ProcessEvent",
    remediation: "Bot collects condition reports with photos and triggers alerts for replacements.",
    narrative: true
  },
  {
    name: "Feedback on Usability",
    category: "ProcessEvent",
    remediation: "Bot sends automated surveys and collects structured usability feedback.",
    narrative: true
  },
  {
    name: "Multiple Deliveries Tracking",
    category: "ProcessEvent",
    remediation: "Bot aggregates deliveries and shows clear history and status.",
    narrative: true
  },
  {
    name: "Unauthorized Asset Usage",
    category: "ProcessEvent",
    remediation: "Bot monitors usage logs, flags anomalies, and alerts admin for investigation.",
    narrative: true
  },
  {
    name: "Beneficiary Accessibility Issues",
    category: "ProcessEvent",
    remediation: "Bot collects accessibility issues via feedback and coordinates logistics resolution.",
    narrative: true
  },
  {
    name: "Lost or Stolen Asset Report",
    category: "ProcessEvent",
    remediation: "Bot logs reports, initiates claims workflows, and notifies donor and admin.",
    narrative: true
  },
  {
    name: "Donor Budget vs Execution Reconciliation",
    category: "Reconciliation",
    remediation: "Bot reconciles donation value against promised budget and flags shortfalls or overruns.",
    narrative: true
  },
  {
    name: "Expense Tracking vs Asset Flow",
    category: "Reconciliation",
    remediation: "Bot analyzes financial data against asset logs and alerts admins of anomalies.",
    narrative: true
  },
  {
    name: "Audit Trail & Compliance Reporting",
    category: "ProcessEvent",
    remediation: "Bot ensures all handoffs are logged and auto-generates audit-ready summaries.",
    narrative: true
  },
  {
    name: "Budget Variance Forecasting",
    category: "ProcessEvent",
    remediation: "Bot analyzes historical trends and predicts budget variances for review.",
    narrative: true
  },
  {
    name: "Regulatory Compliance Check",
    category: "ProcessEvent",
    remediation: "Bot tracks deadlines, verifies document completeness, and escalates non-compliance.",
    narrative: true
  },
  {
    name: "Multi-project Resource Allocation",
    category: "ProcessEvent",
    remediation: "Bot recommends resource redistribution based on priority and availability.",
    narrative: true
  }
];

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * Read-only lookup over a fixed list of use cases. Every entry carries exactly one
 * category tag, so the three category sets are disjoint and cover the registry.
 */
export class UseCaseRegistry {
  private readonly entries: ReadonlyMap<string, Readonly<UseCaseEntry>>;

  constructor(entries: readonly UseCaseEntry[]) {
    const map = new Map<string, Readonly<UseCaseEntry>>();
    for (const entry of entries) {
      if (entry.name.trim().length === 0) {
        throw new RegistryError("Use case names must be non-empty");
      }
      if (!RULE_CATEGORIES.includes(entry.category)) {
        throw new RegistryError(`Use case "${entry.name}" has unknown category "${String(entry.category)}"`);
      }
      if (map.has(entry.name)) {
        throw new RegistryError(`Use case "${entry.name}" is registered more than once`);
      }
      map.set(entry.name, Object.freeze({ ...entry }));
    }
    this.entries = map;
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): Readonly<UseCaseEntry> | null {
    return this.entries.get(name) ?? null;
  }

  categoryOf(name: string): RuleCategory | null {
    return this.entries.get(name)?.category ?? null;
  }

  remediationText(name: string): string | null {
    return this.entries.get(name)?.remediation ?? null;
  }

  namesIn(category: RuleCategory): string[] {
    return this.list()
      .filter((entry) => entry.category === category)
      .map((entry) => entry.name);
  }

  list(): Array<Readonly<UseCaseEntry>> {
    return Array.from(this.entries.values());
  }
}

export const defaultRegistry = new UseCaseRegistry(DEFAULT_USE_CASES);
