import { CheckoutStage } from '../checkout/types';
import { ErrorCode } from '../common/errors';

/** Registration / menu stages outside of checkout */
export type MenuStage = 'ASK_SECRET' | 'ASK_COUNTRY' | 'MAIN_MENU';

export type ConversationStage = MenuStage | Exclude<CheckoutStage, 'IDLE' | 'FINALIZED' | 'CANCELLED'>;

export interface ConversationSession {
  stage: MenuStage;
  /** Phrase given at ASK_SECRET, waiting for the country choice */
  pendingSecret?: string;
}

/** One inbound event from the chat transport */
export interface InboundMessage {
  sessionKey: string;
  transportId: string;
  displayName: string;
  /** Free text typed by the user */
  text?: string;
  /** Button payload, `verb|argument` */
  action?: string;
}

export interface ReplyOption {
  label: string;
  action: string;
}

export interface ReplyDocument {
  filename: string;
  content: string;
  caption: string;
}

export interface OutboundReply {
  stage: ConversationStage;
  text: string;
  options?: ReplyOption[];
  document?: ReplyDocument;
  error?: ErrorCode;
}
