import type { Messaging } from 'firebase-admin/messaging';
import { FcmTokenRepository } from '../repository/fcmTokenRepository';
import { logger as rootLogger, Logger } from '../utils/logger';

export interface NotificationDispatcher {
  /** Resolves false when the message could not be delivered; never rejects. */
  send(userKey: string, title: string, body: string, data: Record<string, string>): Promise<boolean>;
}

export interface FcmDispatcherDeps {
  tokens: FcmTokenRepository;
  messaging: Pick<Messaging, 'send'>;
  log?: Logger;
}

export function createFcmNotificationDispatcher(deps: FcmDispatcherDeps): NotificationDispatcher {
  const log = deps.log ?? rootLogger;

  return {
    async send(userKey, title, body, data) {
      try {
        const token = await deps.tokens.readToken(userKey);
        if (!token) {
          log.debug({ userKey }, '[NOTIFY] No device token registered');
          return false;
        }
        const messageId = await deps.messaging.send({
          token,
          notification: { title, body },
          data,
          android: { priority: 'high' },
        });
        log.info({ userKey, messageId, type: data.type }, '[NOTIFY] Push notification sent');
        return true;
      } catch (err) {
        log.warn({ err, userKey, type: data.type }, '[NOTIFY] Push notification failed');
        return false;
      }
    },
  };
}
