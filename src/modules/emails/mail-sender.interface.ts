export const MAIL_SENDER = Symbol('MAIL_SENDER');

export interface OutgoingMail {
  to: string[];
  subject: string;
  text: string;
  html: string;
}

export interface DeliveryReceipt {
  messageId: string;
  accepted: string[];
  rejected: string[];
}

/** Sends one message to the given recipients. */
export interface MailSender {
  send(mail: OutgoingMail): Promise<DeliveryReceipt>;
}
