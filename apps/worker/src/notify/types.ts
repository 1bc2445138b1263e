export type NotificationEventType = 'target.down' | 'target.up';

export type Notification = {
  event: NotificationEventType;
  subject: string;
  body: string;
  url: string;
  key: string;
  timestamp: number;
  statusCode: number | null;
  error: string | null;
  downtimeSeconds: number | null;
};

// Fire-and-forget publisher. Failures surface as NotifierError and never undo a flag change.
export interface Notifier {
  publish(notification: Notification): Promise<void>;
}

export class NotifierError extends Error {
  constructor(
    message: string,
    public readonly httpStatus: number | null = null,
  ) {
    super(message);
    this.name = 'NotifierError';
  }
}
