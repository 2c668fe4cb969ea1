/**
 * Conversion of email requests to their wire form
 */
import { toAddressArray } from '../validation/addresses.js';
import type { AddressList, EmailRequest, WireEmail } from '../types/email.js';

function optionalList(list: AddressList | undefined): string[] | undefined {
  return list === undefined ? undefined : toAddressArray(list);
}

/**
 * Builds the JSON body for one email. Fields that are not set are left out,
 * so equal requests always produce equal bodies and fingerprints.
 */
export function toWireEmail(request: EmailRequest): WireEmail {
  const wire: WireEmail = {
    from: request.from,
    to: toAddressArray(request.to),
    subject: request.subject,
  };

  if (request.html !== undefined) wire.html = request.html;
  if (request.text !== undefined) wire.text = request.text;

  const cc = optionalList(request.cc);
  if (cc) wire.cc = cc;
  const bcc = optionalList(request.bcc);
  if (bcc) wire.bcc = bcc;
  const replyTo = optionalList(request.reply_to);
  if (replyTo) wire.reply_to = replyTo;

  if (request.attachments !== undefined) {
    wire.attachments = request.attachments.map((attachment) => ({
      filename: attachment.filename,
      content:
        attachment.content instanceof Uint8Array
          ? Buffer.from(attachment.content).toString('base64')
          : attachment.content,
      path: attachment.path,
      content_type: attachment.content_type,
    }));
  }

  if (request.scheduled_at !== undefined) wire.scheduled_at = request.scheduled_at;

  if (request.tags !== undefined) {
    wire.tags = Object.entries(request.tags).map(([name, value]) => ({ name, value }));
  }

  if (request.headers !== undefined) wire.headers = { ...request.headers };

  return wire;
}
