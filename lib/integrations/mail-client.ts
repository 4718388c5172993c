import nodemailer, { Transporter } from "nodemailer";
import { DeliveryCollaborator } from "@/lib/domain/collaborators";
import { ConfigError, DeliveryError, errorMessage } from "@/lib/domain/errors";
import { ReportMessage } from "@/lib/domain/models";
import { envInt, envString } from "@/lib/infra/env";
import { createLogger } from "@/lib/infra/logger";

export interface MailConfig {
  host: string;
  port: number;
  user: string;
  pass: string;
  to: string;
  from: string;
}

const log = createLogger({ component: "mail" });

export function resolveMailConfig(): MailConfig {
  const user = envString("SMTP_USER");
  const config: MailConfig = {
    host: envString("SMTP_HOST"),
    port: envInt("SMTP_PORT", 587, 1),
    user,
    pass: envString("SMTP_PASS"),
    to: envString("MAIL_TO"),
    from: envString("MAIL_FROM", user),
  };
  const missing = [
    ["SMTP_HOST", config.host],
    ["SMTP_USER", config.user],
    ["SMTP_PASS", config.pass],
    ["MAIL_TO", config.to],
    ["MAIL_FROM", config.from],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name);
  if (missing.length) {
    throw new ConfigError(`Missing SMTP settings: ${missing.join(", ")}`);
  }
  return config;
}

export function createSmtpTransport(config: MailConfig): Transporter {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    requireTLS: config.port !== 465,
    auth: {
      user: config.user,
      pass: config.pass,
    },
  });
}

export class MailDelivery implements DeliveryCollaborator {
  constructor(
    private readonly transport: Transporter,
    private readonly from: string,
    private readonly to: string,
  ) {}

  static fromEnv(): MailDelivery {
    const config = resolveMailConfig();
    return new MailDelivery(createSmtpTransport(config), config.from, config.to);
  }

  async deliver(message: ReportMessage): Promise<void> {
    try {
      const info = await this.transport.sendMail({
        from: this.from,
        to: this.to,
        subject: message.subject,
        text: message.text,
        ...(message.html ? { html: message.html } : {}),
      });
      log.info({ messageId: info.messageId, to: this.to }, "report delivered");
    } catch (error) {
      throw new DeliveryError(`Mail delivery failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
