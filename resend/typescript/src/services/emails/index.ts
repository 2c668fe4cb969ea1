export type { EmailsService } from './service.js';
export { EmailsServiceImpl } from './service.js';
export {
  CreateEmailResponseSchema,
  CreateBatchResponseSchema,
  EmailSchema,
  EmailPageSchema,
  EmailMutationResponseSchema,
  parseResponse,
} from './schemas.js';
