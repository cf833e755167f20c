import nodemailer from "nodemailer";
import type { Logger } from "pino";

export type MailProvider = "smtp" | "sendgrid" | "log" | "none";

export type MailKind = "registration" | "change_email" | "reset_password";

export interface MailConfig {
  appName: string;
  provider: MailProvider;
  /** Sender is noreply@domain. */
  domain: string;
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
  };
  sendgrid: {
    apiKey: string;
    url: string;
  };
  /** Link per letter kind; "{token}" is replaced with the token string. */
  linkTemplates: Record<MailKind, string>;
  /** How long each kind of link stays valid, for the letter copy. */
  linkLifetimesSeconds: Record<MailKind, number>;
}

export const MAIL_PROVIDERS: readonly MailProvider[] = [
  "smtp",
  "sendgrid",
  "log",
  "none",
];

export function isMailProvider(value: string): value is MailProvider {
  return MAIL_PROVIDERS.some((p) => p === value);
}

const STYLE = {
  bg: "#0f1115",
  bgElevated: "#171a21",
  text: "#e6e8ee",
  textMuted: "#8a91a1",
  accent: "#3fb67b",
  border: "#2b303c",
  fontSans: "system-ui, -apple-system, 'Segoe UI', sans-serif",
};

export interface SendMailOptions {
  to: string;
  subject: string;
  text: string;
  html: string;
}

export interface Letter {
  subject: string;
  text: string;
  html: string;
}

/**
 * Send an email through the configured provider. "log" writes the letter to
 * the logger, "none" drops it. Returns { sent: false, error } on failure.
 */
export async function sendMail(
  config: MailConfig,
  log: Logger,
  options: SendMailOptions,
): Promise<{ sent: boolean; error?: string }> {
  const from = `noreply@${config.domain}`;

  if (config.provider === "none") {
    return { sent: false };
  }

  if (config.provider === "log") {
    log.info(
      { mail: { from, to: options.to, subject: options.subject } },
      options.text,
    );
    return { sent: true };
  }

  if (config.provider === "smtp") {
    try {
      const transporter = nodemailer.createTransport({
        host: config.smtp.host,
        port: config.smtp.port,
        secure: config.smtp.port === 465 ? config.smtp.secure : false,
        auth: config.smtp.user
          ? { user: config.smtp.user, pass: config.smtp.password }
          : undefined,
      });
      await transporter.sendMail({
        from: `${config.appName} <${from}>`,
        to: options.to,
        subject: options.subject,
        text: options.text,
        html: options.html,
      });
      return { sent: true };
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      return { sent: false, error: msg };
    }
  }

  try {
    const res = await fetch(config.sendgrid.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.sendgrid.apiKey}`,
      },
      body: JSON.stringify({
        personalizations: [{ to: [{ email: options.to }] }],
        from: { email: from, name: config.appName },
        subject: options.subject,
        content: [
          { type: "text/plain", value: options.text },
          { type: "text/html", value: options.html },
        ],
      }),
    });
    if (!res.ok) {
      const data: unknown = await res.json().catch(() => ({}));
      return { sent: false, error: sendgridErrorMessage(data) ?? res.statusText };
    }
    return { sent: true };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { sent: false, error: msg };
  }
}

function sendgridErrorMessage(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("errors" in data)) {
    return undefined;
  }
  const errors = data.errors;
  if (!Array.isArray(errors)) return undefined;
  const first: unknown = errors[0];
  if (typeof first !== "object" || first === null || !("message" in first)) {
    return undefined;
  }
  return typeof first.message === "string" ? first.message : undefined;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** "{token}" in the template becomes the URL-encoded token string. */
export function buildLink(template: string, tokenString: string): string {
  return template.split("{token}").join(encodeURIComponent(tokenString));
}

export function expiryCopy(seconds: number): string {
  const hours = Math.round(seconds / 3600);
  if (hours >= 48 && hours % 24 === 0) return `${hours / 24} days`;
  if (hours >= 1) return hours === 1 ? "1 hour" : `${hours} hours`;
  const minutes = Math.max(1, Math.round(seconds / 60));
  return minutes === 1 ? "1 minute" : `${minutes} minutes`;
}

interface LetterParts {
  appName: string;
  subject: string;
  lead: string;
  body: string;
  action: string;
  url: string;
  expiresIn: string;
  ignoreNote: string;
}

function renderLetter(parts: LetterParts): Letter {
  const text = [
    parts.body,
    "",
    parts.url,
    "",
    `This link expires in ${parts.expiresIn}. ${parts.ignoreNote}`,
    "",
    parts.appName,
  ].join("\n");

  const url = escapeHtml(parts.url);
  const appName = escapeHtml(parts.appName);
  const html = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(parts.subject)}</title>
</head>
<body style="margin:0; font-family: ${STYLE.fontSans}; background: ${STYLE.bg}; color: ${STYLE.text}; line-height: 1.6;">
  <div style="max-width: 480px; margin: 0 auto; padding: 32px 24px;">
    <div style="background: ${STYLE.bgElevated}; border: 1px solid ${STYLE.border}; border-radius: 16px; padding: 32px 28px;">
      <h1 style="margin: 0 0 8px; font-size: 1.5rem; font-weight: 700; color: ${STYLE.text};">${appName}</h1>
      <p style="margin: 0 0 24px; font-size: 0.875rem; color: ${STYLE.textMuted};">${escapeHtml(parts.lead)}</p>
      <p style="margin: 0 0 24px; font-size: 1rem; color: ${STYLE.text};">${escapeHtml(parts.body)}</p>
      <p style="margin: 0 0 24px; text-align: center;">
        <a href="${url}" style="display: inline-block; padding: 12px 24px; background: ${STYLE.accent}; color: ${STYLE.bg}; font-weight: 600; text-decoration: none; border-radius: 8px;">${escapeHtml(parts.action)}</a>
      </p>
      <p style="margin: 0; font-size: 0.8125rem; color: ${STYLE.textMuted}; text-align: center;">
        This link expires in ${escapeHtml(parts.expiresIn)}. ${escapeHtml(parts.ignoreNote)}
      </p>
    </div>
  </div>
</body>
</html>`;

  return { subject: parts.subject, text, html };
}

export function buildRegistrationLetter(
  appName: string,
  verifyUrl: string,
  expiresIn: string,
): Letter {
  return renderLetter({
    appName,
    subject: `Confirm your ${appName} registration`,
    lead: "Welcome! Confirm your email to finish signing up.",
    body: "Please confirm your email address by opening the link below:",
    action: "Confirm email",
    url: verifyUrl,
    expiresIn,
    ignoreNote: "If you didn't sign up, you can ignore this email.",
  });
}

export function buildChangeEmailLetter(
  appName: string,
  verifyUrl: string,
  expiresIn: string,
): Letter {
  return renderLetter({
    appName,
    subject: `Confirm your new ${appName} email`,
    lead: "Confirm your new email address",
    body: "Open the link below to use this address for your account:",
    action: "Confirm new email",
    url: verifyUrl,
    expiresIn,
    ignoreNote: "If you didn't ask for this change, you can ignore this email.",
  });
}

export function buildResetPasswordLetter(
  appName: string,
  resetUrl: string,
  expiresIn: string,
): Letter {
  return renderLetter({
    appName,
    subject: `Reset your ${appName} password`,
    lead: "Reset your password",
    body: "Someone requested a password reset for your account. Open the link below to set a new password:",
    action: "Set new password",
    url: resetUrl,
    expiresIn,
    ignoreNote: "If you didn't request a reset, you can ignore this email.",
  });
}

const BUILDERS: Record<
  MailKind,
  (appName: string, url: string, expiresIn: string) => Letter
> = {
  registration: buildRegistrationLetter,
  change_email: buildChangeEmailLetter,
  reset_password: buildResetPasswordLetter,
};

export function buildLetter(
  config: MailConfig,
  kind: MailKind,
  tokenString: string,
): Letter {
  const url = buildLink(config.linkTemplates[kind], tokenString);
  const expiresIn = expiryCopy(config.linkLifetimesSeconds[kind]);
  return BUILDERS[kind](config.appName, url, expiresIn);
}
