export interface NotificationServer {
  readonly id: string;
  readonly name: string;
  readonly kind: 'webhook';
}

export interface NotificationField {
  readonly name: string;
  readonly value: string;
  readonly inline?: boolean;
}

export interface NotificationMessage {
  readonly title: string;
  readonly body: string;
  readonly url?: string;
  readonly fields?: readonly NotificationField[];
}

export interface NotificationDelivery {
  readonly serverId: string;
  readonly success: boolean;
  readonly error?: string;
}

/**
 * Outbound alert channel. Delivery failures are reported per server, never
 * thrown.
 */
export interface NotificationGateway {
  listServers(): NotificationServer[];
  notify(message: NotificationMessage): Promise<NotificationDelivery[]>;
}
