/**
 * Courier dispatch drivers. Each one delivers the anonymized notice of a new
 * order; a failure is thrown and left to the coordinator, which logs it and
 * keeps the order.
 */

import axios, {AxiosInstance} from 'axios';
import nodemailer, {Transporter} from 'nodemailer';
import type {DispatchNotice} from '../types';
import type {DispatchService} from '../pure/effects';
import type {EmailConfig, WebhookConfig} from './types';
import {buildDispatchMessage} from '../pure/businessLogic';

// ============================================================================
// Axios Webhook Dispatch
// ============================================================================

export class WebhookDispatchService implements DispatchService {
  private client: AxiosInstance;

  constructor(config: WebhookConfig) {
    this.client = axios.create({
      baseURL: config.url,
      timeout: config.timeoutMs,
    });
  }

  async notifyNewOrder(notice: DispatchNotice): Promise<void> {
    try {
      await this.client.post('', notice);
      console.log(`Dispatch webhook notified for order ${notice.code}`);
    } catch (error) {
      console.error('Failed to call dispatch webhook:', error);
      throw new Error('Dispatch webhook unavailable');
    }
  }
}

// ============================================================================
// Nodemailer Dispatch
// ============================================================================

export class EmailDispatchService implements DispatchService {
  private transporter: Transporter;

  constructor(private config: EmailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: false,
      ignoreTLS: true,
    });
  }

  async notifyNewOrder(notice: DispatchNotice): Promise<void> {
    const payload = buildDispatchMessage(notice);
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: this.config.dispatchTo,
        subject: payload.subject,
        text: payload.body,
        html: `<p>${payload.body.replace(/\n/g, '<br>')}</p>`,
      });
      console.log(`Dispatch email sent to ${this.config.dispatchTo}: ${payload.subject}`);
    } catch (error) {
      console.error('Failed to send dispatch email:', error);
      throw new Error('Email service unavailable');
    }
  }
}

// ============================================================================
// Console Dispatch
// ============================================================================

export class LoggingDispatchService implements DispatchService {
  async notifyNewOrder(notice: DispatchNotice): Promise<void> {
    console.log(buildDispatchMessage(notice).body);
  }
}
