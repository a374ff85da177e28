// ============================================================================
// Job Types
// ============================================================================

export interface InboundJobData {
  type: 'inbound_message';
  correlationId: string;
  messageId: string;
  phone: string;
  message: string;
  contactName?: string;
  attachments: MediaRef[];
  timestamp: string;
}

export type MaintenanceJobName = 'sweep-idle-sessions' | 'review-reminders';

export interface JobResult {
  status: 'completed' | 'failed' | 'skipped';
  correlationId: string;
  action?: string;
  error?: string;
}

// ============================================================================
// Conversation Types
// ============================================================================

export type Language = 'ar' | 'en';

export type ConversationState =
  | 'idle'
  | 'awaiting_menu_choice'
  | 'awaiting_product'
  | 'awaiting_issue'
  | 'awaiting_photo'
  | 'awaiting_confirmation'
  | 'completed';

export interface MediaRef {
  id: string;
  type: 'image' | 'audio' | 'video' | 'document';
  mimeType?: string;
  caption?: string;
}

export interface ComplaintDraft {
  product?: string;
  issue?: string;
  photos: MediaRef[];
}

export interface CompleteComplaint {
  product: string;
  issue: string;
  photos: MediaRef[];
}

export interface ConversationSession {
  phone: string;
  state: ConversationState;
  language: Language;
  draft: ComplaintDraft;
  createdAt: Date;
  updatedAt: Date;
}

export interface OutboundMessage {
  text: string;
  language: Language;
}

export interface Customer {
  phone: string;
  contactName: string | null;
  language: Language;
  createdAt: Date;
  updatedAt: Date;
}

export type MessageDirection = 'inbound' | 'outbound';

export interface ConversationMessage {
  id: number;
  phone: string;
  direction: MessageDirection;
  body: string;
  /** WhatsApp id of an inbound message. */
  messageId: string | null;
  attachments: MediaRef[];
  /** Outbound only; null when the reply was returned without being sent. */
  delivered: boolean | null;
  createdAt: Date;
}

export type NewConversationMessage = Omit<ConversationMessage, 'id'>;

// ============================================================================
// Ticket Types
// ============================================================================

export type TicketStatus =
  | 'new'
  | 'under_review'
  | 'decided'
  | 'completed'
  | 'cancelled'
  | 'rejected';

export type CompensationType = 'refund' | 'replacement';

export type RoutingOutcome = 'refund' | 'replacement' | 'manual_review';

export type RoutingRule =
  | 'defect_with_photo'
  | 'defect_without_photo'
  | 'wrong_item'
  | 'default';

export interface RoutingDecision {
  outcome: RoutingOutcome;
  rule: RoutingRule;
  initialStatus: Extract<TicketStatus, 'under_review' | 'decided'>;
  compensationType: CompensationType | null;
  issueCategory: string;
  matchedKeyword?: string;
}

export interface ReviewerInfo {
  reviewer: string;
  notes?: string;
  /** Required when moving to `decided`. */
  compensationType?: CompensationType;
}

export interface Ticket {
  id: number;
  ticketNumber: string;
  phone: string;
  product: string;
  issue: string;
  issueCategory: string;
  photos: MediaRef[];
  status: TicketStatus;
  compensationType: CompensationType | null;
  routingOutcome: RoutingOutcome;
  routingRule: RoutingRule;
  matchedKeyword: string | null;
  language: Language;
  reviewer: string | null;
  reviewerNotes: string | null;
  decidedAt: Date | null;
  assignedTechnicianId: number | null;
  sourceMessageId: string | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
  lastRemindedAt: Date | null;
}

export interface TicketStatusChange {
  fromStatus: TicketStatus | null;
  toStatus: TicketStatus;
  changedBy: string;
  reason: string | null;
  createdAt: Date;
}

export interface TicketFilter {
  status?: TicketStatus;
  phone?: string;
  technicianId?: number;
  limit?: number;
}

export interface Technician {
  id: number;
  name: string;
  active: boolean;
  currentWorkload: number;
  maxWorkload: number;
}
