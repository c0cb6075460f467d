/**
 * Notification destinations
 */

export {
  SlackWebhookDestination,
  buildSlackBlocks,
  buildSlackPayload,
  buildSlackText,
  isValidWebhookUrl,
  type SlackDestinationOptions,
  type SlackWebhookPayload,
} from "./slack.js";
export {
  SesEmailDestination,
  SesTransport,
  buildHtmlBody,
  buildSubject,
  buildTextBody,
  classifySesError,
  escapeHtml,
  type EmailDestinationOptions,
  type EmailMessage,
  type EmailTransport,
} from "./email.js";
