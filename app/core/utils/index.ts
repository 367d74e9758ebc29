export { abortable } from './abortable';
export { generateRequestId } from './request-id';
