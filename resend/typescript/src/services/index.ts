// Emails
export type { EmailsService } from './emails/index.js';
export { EmailsServiceImpl } from './emails/index.js';
