import nodemailer from "nodemailer";
import { config } from "../config.js";
import type { TriggeredAlert } from "../types.js";

let transporter: nodemailer.Transporter | null = null;

function getTransporter(): nodemailer.Transporter {
  if (!transporter) {
    transporter = nodemailer.createTransport({
      host: config.smtp.host,
      port: config.smtp.port,
      secure: config.smtp.port === 465,
      auth: {
        user: config.smtp.user,
        pass: config.smtp.pass,
      },
    });
  }
  return transporter;
}

export function digestSubject(triggered: TriggeredAlert[]): string {
  if (triggered.length === 1) {
    const { alert } = triggered[0];
    return `Price alert: ${alert.symbol} is ${alert.condition} $${alert.targetPrice}`;
  }
  return `Price alerts: ${triggered.length} triggered`;
}

export function digestBody(username: string, triggered: TriggeredAlert[]): string {
  const lines = triggered.map(
    ({ alert, currentPrice }) =>
      `  ${alert.symbol.padEnd(6)} $${currentPrice.toFixed(2).padStart(10)}  (${alert.condition} $${alert.targetPrice})`,
  );
  return [
    `Hi ${username},`,
    ``,
    `These alerts just crossed their targets:`,
    ...lines,
    ``,
    `Each alert fires once. Create a new one to keep watching a stock.`,
  ].join("\n");
}

/** One email per user and check, listing every alert of theirs that fired. */
export async function sendAlertDigest(recipient: string, username: string, triggered: TriggeredAlert[]): Promise<void> {
  await getTransporter().sendMail({
    from: config.smtp.user,
    to: recipient,
    subject: digestSubject(triggered),
    text: digestBody(username, triggered),
  });
}
