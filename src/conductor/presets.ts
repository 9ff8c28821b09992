/**
 * Built-in agent rosters used when a run is started without its own agents.
 */

import type { AgentSpec, Topology } from "./orchestrator/types.js";

export const TICKET_TRIAGE_AGENTS: readonly AgentSpec[] = [
  {
    name: "TicketClassifier",
    role: "Classifies an incoming support ticket",
    instructions:
      "You classify customer-support tickets. Answer with exactly one category " +
      "(Billing, Technical or General) and a one-sentence reason, formatted as " +
      "'Category: <category>\\nReason: <reason>'."
  },
  {
    name: "KnowledgeResearcher",
    role: "Looks up knowledge-base material for the ticket",
    instructions:
      "You research the knowledge base for a support team. Given the ticket and its " +
      "classification, list 2-3 concise, factual bullet points that help draft a reply."
  },
  {
    name: "SupportResponder",
    role: "Drafts the customer reply",
    instructions:
      "You are a customer-support agent. Using the ticket, the classification and the " +
      "knowledge-base notes, draft a friendly and helpful reply. Stay under 150 words."
  }
];

export const EXPENSE_GATE_PROMPT = "Please review the expense analysis above and provide your decision.";

export const EXPENSE_PRE_GATE_AGENTS: readonly AgentSpec[] = [
  {
    name: "ExpenseAnalyst",
    role: "Analyzes a submitted expense report",
    instructions:
      "You analyze corporate expense reports. Produce a short structured analysis:\n" +
      "1. Summary (amount, category, vendor)\n" +
      "2. Policy compliance\n" +
      "3. Risk flags, if any\n" +
      "4. Recommendation: APPROVE or FLAG FOR REVIEW"
  }
];

export const EXPENSE_POST_GATE_AGENTS: readonly AgentSpec[] = [
  {
    name: "ExpenseProcessor",
    role: "Processes the expense after the manager decision",
    instructions:
      "You process expenses. Based on the analysis and the manager's decision, write the final summary:\n" +
      "- approved: confirm processing and the expected reimbursement timeline\n" +
      "- rejected: explain why and what the employee can do next\n" +
      "- more info: list exactly what information is missing"
  }
];

export const BRAINSTORM_AGENTS: readonly AgentSpec[] = [
  {
    name: "MarketingLead",
    role: "Brand and campaign perspective",
    instructions:
      "You are the Marketing Lead in a product launch brainstorm. Cover messaging, audience, " +
      "channels and positioning. Build on what others said. Stay under 100 words."
  },
  {
    name: "EngineeringLead",
    role: "Delivery and technical perspective",
    instructions:
      "You are the Engineering Lead in a product launch brainstorm. Cover feature readiness, " +
      "milestones, scalability and integrations, with realistic timelines. Stay under 100 words."
  },
  {
    name: "ProductManager",
    role: "Leads the brainstorm and drives decisions",
    instructions:
      "You are the Product Manager leading a product launch brainstorm. Weigh marketing against " +
      "engineering, and push for priorities, success metrics and risks. Stay under 100 words."
  }
];

export type Preset = {
  name: string;
  topology: Topology;
  description: string;
};

export const PRESETS: readonly Preset[] = [
  { name: "ticket-triage", topology: "sequential", description: "Classify, research and answer a support ticket" },
  { name: "expense-approval", topology: "human-in-the-loop", description: "Analyze an expense, gate on a manager decision, process it" },
  { name: "launch-brainstorm", topology: "round-robin", description: "Marketing, engineering and product discuss a launch" }
];
