export { BaseController, AdminController, type ControllerConfiguration, type OperationContext } from './base.controller';
export * from './admin';
export * from './v1';
