import { MemoryDocumentStore } from './helpers/memoryDocumentStore';
import { COLLECTIONS } from '../src/repository/documentStore';
import { createFcmTokenRepository } from '../src/repository/fcmTokenRepository';
import { createFcmNotificationDispatcher } from '../src/services/notificationService';

describe('FCM notification dispatcher', () => {
  let store: MemoryDocumentStore;
  let send: jest.Mock;

  const dispatcher = () => createFcmNotificationDispatcher({ tokens: createFcmTokenRepository(store), messaging: { send } });

  beforeEach(() => {
    store = new MemoryDocumentStore();
    send = jest.fn().mockResolvedValue('msg-1');
    store.seed(COLLECTIONS.fcmTokens, 'user-1', { token: 'device-token-1' });
  });

  it('sends a high-priority message to the registered device', async () => {
    const delivered = await dispatcher().send('user-1', 'Hello', 'World', { type: 'low_credit' });

    expect(delivered).toBe(true);
    expect(send).toHaveBeenCalledWith({
      token: 'device-token-1',
      notification: { title: 'Hello', body: 'World' },
      data: { type: 'low_credit' },
      android: { priority: 'high' },
    });
  });

  it('reports users without a device token as unreachable', async () => {
    expect(await dispatcher().send('user-2', 'Hello', 'World', { type: 'low_credit' })).toBe(false);
    expect(send).not.toHaveBeenCalled();
  });

  it('resolves false when the messaging call fails', async () => {
    send.mockRejectedValue(new Error('registration-token-not-registered'));

    expect(await dispatcher().send('user-1', 'Hello', 'World', { type: 'debt_reminder' })).toBe(false);
  });
});
