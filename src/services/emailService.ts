/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - EMAIL SERVICE
 * ============================================================================
 */

import nodemailer, { type Transporter } from 'nodemailer';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';

const log = logger.child('email');

export interface EmailOptions {
  to: string;
  subject: string;
  html: string;
  text: string;
  replyTo?: string;
}

/**
 * Anything that can deliver an e-mail; `false` means it was not delivered
 */
export interface Mailer {
  sendEmail(options: EmailOptions): Promise<boolean>;
}

function createSmtpTransport(): Transporter {
  const { smtp, timeout } = config.email;

  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.user ? { user: smtp.user, pass: smtp.password } : undefined,
    connectionTimeout: timeout,
    greetingTimeout: timeout,
    socketTimeout: timeout,
  });
}

export class EmailService implements Mailer {
  private readonly transporter: Transporter;

  constructor(transporter?: Transporter) {
    this.transporter = transporter ?? createSmtpTransport();
  }

  async sendEmail(options: EmailOptions): Promise<boolean> {
    const emailId = uuidv4();

    try {
      const result = await this.transporter.sendMail({
        from: config.email.from,
        to: options.to,
        subject: options.subject,
        text: options.text,
        html: options.html,
        replyTo: options.replyTo,
      });

      log.info('Email sent successfully', {
        emailId,
        messageId: result.messageId,
        subject: options.subject,
      });

      return true;
    } catch (error) {
      log.error('Failed to send email', {
        emailId,
        error: errorMessage(error),
        subject: options.subject,
      });

      return false;
    }
  }
}
