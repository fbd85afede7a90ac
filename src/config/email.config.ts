import { Env, readInt, readString } from './env.util';

export const EMAIL_CONFIG = Symbol('EMAIL_CONFIG');

export interface EmailConfig {
  smtp: {
    host: string;
    port: number;
    /** Implicit TLS (usually port 465). When false, STARTTLS is required. */
    secure: boolean;
    auth: {
      user: string;
      pass: string;
    };
    timeoutMs: number;
  };
  from: {
    name: string;
    email: string;
  };
  defaultSubject: string;
}

export function loadEmailConfig(env: Env = process.env): EmailConfig {
  const user = readString(env, 'SMTP_USER');

  return {
    smtp: {
      host: readString(env, 'SMTP_HOST', 'smtp.gmail.com'),
      port: readInt(env, 'SMTP_PORT', 587),
      secure: readString(env, 'SMTP_SECURE') === 'true',
      auth: {
        user,
        pass: readString(env, 'SMTP_PASS'),
      },
      timeoutMs: readInt(env, 'SMTP_TIMEOUT_MS', 30_000),
    },
    from: {
      name: readString(env, 'EMAIL_FROM_NAME', 'Meeting Summarizer'),
      email: readString(env, 'EMAIL_FROM_EMAIL', readString(env, 'FROM_EMAIL', user)),
    },
    defaultSubject: readString(env, 'EMAIL_DEFAULT_SUBJECT', 'Meeting Summary'),
  };
}

export function isSmtpConfigured(config: EmailConfig): boolean {
  const { smtp, from } = config;
  return Boolean(smtp.host && smtp.auth.user && smtp.auth.pass && from.email);
}
