import nodemailer from 'nodemailer'
import { config } from '../config'

export interface MailMessage {
  to: string
  subject: string
  html: string
  text: string
}

/** Delivers one message or rejects. */
export interface Mailer {
  send(message: MailMessage): Promise<void>
}

export function createSmtpMailer(): Mailer {
  const { smtp } = config.notifier
  const transport = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
  })

  return {
    async send(message) {
      await transport.sendMail({ from: config.notifier.from, ...message })
    },
  }
}
