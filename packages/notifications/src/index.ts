export type NotificationContext = Record<string, string | number | boolean>;

export type NotificationsAdapter = {
  notify: (info: string, context?: NotificationContext) => void;
  notifyError: (err: unknown, context?: NotificationContext) => void;
};

export type ConsoleSink = Pick<Console, 'log' | 'error'>;

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

export function createConsoleNotificationsAdapter(sink: ConsoleSink = console): NotificationsAdapter {
  return {
    notify(info, context) {
      sink.log(`[INFO] ${info}`, context ?? {});
    },
    notifyError(err, context) {
      sink.error(`[ERROR] ${errorMessage(err)}`, context ?? {}, err);
    },
  };
}

// Drops everything; the default when a caller wires no logging.
export const silentNotificationsAdapter: NotificationsAdapter = {
  notify() {},
  notifyError() {},
};
