/**
 * Remote record-store entities (the subset of Zendesk fields we read)
 */
export interface Ticket {
  id: number;
  subject: string;
  status: string;
  tags: string[];
  priority: string | null;
}

export interface TicketChanges {
  tags?: string[];
  macroIds?: number[];
}

export interface View {
  id: number;
  title: string;
  active: boolean;
}

export interface MacroAction {
  field: string;
  value: unknown;
}

export interface Macro {
  id: number;
  title: string;
  active: boolean;
  actions: MacroAction[];
}

export interface AgentIdentity {
  id: number;
  name: string;
  email: string;
}
