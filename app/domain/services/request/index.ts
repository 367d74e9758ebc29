export { RequestLogService, type IRequestLogService, type RequestLogInput } from './request-log.service';
