export type {
  NotificationGateway,
  NotificationServer,
  NotificationMessage,
  NotificationField,
  NotificationDelivery
} from './notification.gateway';
export { WebhookNotificationGateway, parseWebhookUrls } from './webhook-notification.gateway';
