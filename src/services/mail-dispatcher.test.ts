import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SmtpDispatcher, type MailTransport } from './mail-dispatcher.js';
import type { OutgoingMessage } from '../types/index.js';

const message: OutgoingMessage = {
  sender: 'sender@example.com',
  recipients: ['ops@acme.test'],
  subject: 'Renewal Reminder: Acme Ltd expires today',
  body: 'Dear Acme Ltd,',
};

const smtpError = (text: string, code: string) => Object.assign(new Error(text), { code });

function createDispatcher(transport: MailTransport, overrides: { user?: string; password?: string } = {}) {
  return new SmtpDispatcher({
    host: 'smtp.example.com',
    port: 587,
    user: overrides.user ?? 'sender@example.com',
    password: overrides.password ?? 'test-secret',
    retryAttempts: 2,
    retryDelayMs: 0,
    transport,
  });
}

describe('SmtpDispatcher', () => {
  it('sends the message through the transport', async () => {
    const sendMail = vi.fn().mockResolvedValue({ messageId: '<m1@test>' });

    const result = await createDispatcher({ sendMail }).send(message);

    expect(result).toEqual({ ok: true, messageId: '<m1@test>' });
    expect(sendMail).toHaveBeenCalledWith({
      from: 'sender@example.com',
      to: ['ops@acme.test'],
      subject: 'Renewal Reminder: Acme Ltd expires today',
      text: 'Dear Acme Ltd,',
      attachments: [],
    });
  });

  it('cleans header values before sending', async () => {
    const sendMail = vi.fn().mockResolvedValue({ messageId: '<m2@test>' });

    await createDispatcher({ sendMail }).send({
      ...message,
      recipients: ['ops@acme.test\r\nBcc: spy@evil.test'],
      subject: 'Renewal\nReminder',
    });

    expect(sendMail.mock.calls[0][0]).toMatchObject({
      to: ['ops@acme.test'],
      subject: 'Renewal Reminder',
    });
  });

  it('reports authentication failures without retrying', async () => {
    const sendMail = vi.fn().mockRejectedValue(smtpError('Invalid login', 'EAUTH'));

    const result = await createDispatcher({ sendMail }).send(message);

    expect(result).toEqual({ ok: false, kind: 'auth', error: 'Invalid login' });
    expect(sendMail).toHaveBeenCalledTimes(1);
  });

  it('retries dropped connections', async () => {
    const sendMail = vi
      .fn()
      .mockRejectedValueOnce(smtpError('Connection closed', 'ECONNECTION'))
      .mockResolvedValueOnce({ messageId: '<m3@test>' });

    const result = await createDispatcher({ sendMail }).send(message);

    expect(result).toEqual({ ok: true, messageId: '<m3@test>' });
    expect(sendMail).toHaveBeenCalledTimes(2);
  });

  it('reports other failures as transport errors', async () => {
    const sendMail = vi.fn().mockRejectedValue(smtpError('Message rejected', 'EENVELOPE'));

    const result = await createDispatcher({ sendMail }).send(message);

    expect(result).toEqual({ ok: false, kind: 'transport', error: 'Message rejected' });
    expect(sendMail).toHaveBeenCalledTimes(1);
  });

  it('does not send without credentials', async () => {
    const sendMail = vi.fn();

    const result = await createDispatcher({ sendMail }, { password: '' }).send(message);

    expect(result).toMatchObject({ ok: false, kind: 'config' });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('does not send without recipients', async () => {
    const sendMail = vi.fn();

    const result = await createDispatcher({ sendMail }).send({ ...message, recipients: ['  '] });

    expect(result).toEqual({ ok: false, kind: 'config', error: 'No recipients' });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('attaches the agreement file when it exists', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'mail-dispatcher-'));
    try {
      const path = join(dir, 'acme.pdf');
      await writeFile(path, 'contract');
      const sendMail = vi.fn().mockResolvedValue({ messageId: '<m4@test>' });

      await createDispatcher({ sendMail }).send({ ...message, attachmentPath: path });

      expect(sendMail.mock.calls[0][0].attachments).toEqual([{ filename: 'acme.pdf', path }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('sends without the attachment when the file is missing', async () => {
    const sendMail = vi.fn().mockResolvedValue({ messageId: '<m5@test>' });

    const result = await createDispatcher({ sendMail }).send({
      ...message,
      attachmentPath: '/nonexistent/acme.pdf',
    });

    expect(result.ok).toBe(true);
    expect(sendMail.mock.calls[0][0].attachments).toEqual([]);
  });
});
