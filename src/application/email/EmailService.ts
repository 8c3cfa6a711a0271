// Application: Email Service
// Renders pug templates and sends them over SMTP with nodemailer

import nodemailer, { type Transporter } from 'nodemailer';
import pug, { type compileTemplate } from 'pug';
import path from 'path';
import type { MailConfig } from '@/utils/config.js';
import { mailLogger } from '@/utils/logger.js';

export const EmailTemplateName = {
  ACTIVATE_ACCOUNT: 'activate-account',
} as const;

export type EmailTemplateName = (typeof EmailTemplateName)[keyof typeof EmailTemplateName];

export interface TemplatedEmail {
  to: string;
  username: string;
  template: EmailTemplateName;
  confirmationUrl: string;
  activationCode: string;
  subject: string;
}

/**
 * Anything able to deliver a templated email (SMTP in production, fakes in tests)
 */
export interface EmailSender {
  sendEmail(email: TemplatedEmail): Promise<void>;
}

export interface EmailServiceOptions {
  from: string;
  templatesDir?: string;
}

export class EmailService implements EmailSender {
  private readonly templatesDir: string;
  private readonly compiled = new Map<EmailTemplateName, compileTemplate>();

  constructor(
    private readonly transporter: Transporter,
    private readonly options: EmailServiceOptions
  ) {
    this.templatesDir = options.templatesDir ?? path.join(process.cwd(), 'templates');
  }

  async sendEmail(email: TemplatedEmail): Promise<void> {
    const html = this.render(email);

    await this.transporter.sendMail({
      from: this.options.from,
      to: email.to,
      subject: email.subject,
      html,
    });

    mailLogger.info('Email sent', { to: email.to, template: email.template });
  }

  /**
   * Render the HTML body of an email
   */
  render(email: TemplatedEmail): string {
    return this.template(email.template)({
      username: email.username,
      confirmationUrl: email.confirmationUrl,
      activationCode: email.activationCode,
      subject: email.subject,
    });
  }

  private template(name: EmailTemplateName): compileTemplate {
    let compiled = this.compiled.get(name);
    if (!compiled) {
      compiled = pug.compileFile(path.join(this.templatesDir, `${name}.pug`));
      this.compiled.set(name, compiled);
    }
    return compiled;
  }
}

/**
 * Create EmailService with an SMTP transport from mail configuration
 */
export function createEmailService(config: MailConfig): EmailService {
  const transporter = nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: config.user && config.password ? { user: config.user, pass: config.password } : undefined,
    connectionTimeout: 5000,
    greetingTimeout: 5000,
  });

  mailLogger.info('SMTP transport created', { host: config.host, port: config.port });

  return new EmailService(transporter, { from: config.from });
}
