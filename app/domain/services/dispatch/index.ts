export { DispatcherService, type IDispatcherService } from './dispatcher.service';
