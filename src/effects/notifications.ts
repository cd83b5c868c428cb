import type {NotificationPayload} from '../types';
import type {NotificationService} from '../pure/effects';
import type {EmailConfig} from './types';
import {EffectsError, toError} from './EffectsError';
import nodemailer, {Transporter} from 'nodemailer';
import {Pool} from 'pg';

// ============================================================================
// In-app inbox (notifications table)
// ============================================================================

export class PostgresNotificationInbox implements NotificationService {
  constructor(private pool: Pool) {}

  async publish(payload: NotificationPayload): Promise<void> {
    await this.pool.query(
      `INSERT INTO notifications (user_id, title, message, type, related_order_id)
       VALUES ($1, $2, $3, $4, $5)`,
      [payload.userId, payload.title, payload.message, payload.type, payload.relatedOrderId]
    );
  }
}

// ============================================================================
// Nodemailer
// ============================================================================

export class NodemailerNotificationService implements NotificationService {
  private transporter: Transporter;

  constructor(private pool: Pool, private config: EmailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: false, // MailHog doesn't use TLS
      ignoreTLS: true,
    });
  }

  async publish(payload: NotificationPayload): Promise<void> {
    const result = await this.pool.query<{ email: string }>('SELECT email FROM users WHERE id = $1', [payload.userId]);
    if (result.rows.length === 0) {
      return;
    }

    const to = result.rows[0].email;
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to,
        subject: payload.title,
        text: payload.message,
        html: `<p>${payload.message.replace(/\n/g, '<br>')}</p>`,
      });
      console.log(`📧 Email sent to ${to}: ${payload.title}`);
    } catch (error) {
      console.error('Failed to send email:', error);
      throw new Error('Email service unavailable');
    }
  }
}

// ============================================================================
// Fan-out
// ============================================================================

/** Publishes to every channel; fails when any channel failed. */
export class CompositeNotificationService implements NotificationService {
  constructor(private channels: NotificationService[]) {}

  async publish(payload: NotificationPayload): Promise<void> {
    const results = await Promise.allSettled(this.channels.map(channel => channel.publish(payload)));
    const errors = results.flatMap(result => (result.status === 'rejected' ? [toError(result.reason)] : []));
    if (errors.length) throw new EffectsError(errors);
  }
}
