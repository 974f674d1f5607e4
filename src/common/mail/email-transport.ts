// src/common/mail/email-transport.ts

export const EMAIL_TRANSPORT = Symbol('EMAIL_TRANSPORT');

export interface OutboundEmail {
  to: string;
  subject: string;
  html: string;
  fromEmail: string;
  fromName: string;
}

export interface EmailSendResult {
  success: boolean;
  message: string;
  messageId?: string;
}

/** Outbound email capability. Implementations report failure in the result instead of throwing. */
export interface EmailTransport {
  send(email: OutboundEmail): Promise<EmailSendResult>;
}
