import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>()
  return { ...actual, default: { post: vi.fn() } }
})

import axios, { AxiosHeaders, type AxiosResponse } from 'axios'
import { config } from '../../config'
import {
  dispatchOrderNotifications, notificationTargets, sendOrderNotifications, type OrderNotificationPayload,
} from '../notification.service'

const payload: OrderNotificationPayload = {
  order_number: 'ORD-TEST-1-ABCDEF',
  customer_name: 'Ada Guest',
  customer_phone: '+15550001111',
  customer_email: 'ada@example.com',
  total_amount: 120,
  status: 'pending',
  notes: null,
  items: [{ item_type: 'product', item_id: 3, item_name: 'Spa Package', quantity: 1, unit_price: 120, total_price: 120 }],
}

function ok(): AxiosResponse {
  return { data: { success: true }, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } }
}

const flushImmediates = () => new Promise<void>(resolve => setImmediate(resolve))

describe('notification service', () => {
  beforeEach(() => {
    vi.mocked(axios.post).mockReset()
  })

  describe('notificationTargets', () => {
    it('confirms to the customer only when an email is known', () => {
      expect(notificationTargets(payload)).toEqual(['send-order-confirmation', 'send-admin-notification'])
      expect(notificationTargets({ ...payload, customer_email: null })).toEqual(['send-admin-notification'])
    })
  })

  describe('sendOrderNotifications', () => {
    it('posts the order to each notifier route', async () => {
      vi.mocked(axios.post).mockResolvedValue(ok())

      const outcomes = await sendOrderNotifications(payload)

      expect(outcomes).toEqual([
        { target: 'send-order-confirmation', delivered: true },
        { target: 'send-admin-notification', delivered: true },
      ])
      expect(axios.post).toHaveBeenCalledWith(
        'http://notifier.test/send-order-confirmation',
        payload,
        { timeout: 3000, headers: { 'Content-Type': 'application/json' } }
      )
      expect(axios.post).toHaveBeenCalledTimes(2)
    })

    it('reports failed deliveries without rejecting', async () => {
      vi.mocked(axios.post)
        .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
        .mockResolvedValueOnce(ok())

      await expect(sendOrderNotifications(payload)).resolves.toEqual([
        { target: 'send-order-confirmation', delivered: false },
        { target: 'send-admin-notification', delivered: true },
      ])
    })
  })

  describe('dispatchOrderNotifications', () => {
    const enabled = config.notifications.enabled

    afterEach(() => {
      config.notifications.enabled = enabled
    })

    it('sends on a later tick, not inline', async () => {
      config.notifications.enabled = true
      vi.mocked(axios.post).mockResolvedValue(ok())

      dispatchOrderNotifications({ ...payload, customer_email: null })
      expect(axios.post).not.toHaveBeenCalled()

      await flushImmediates()
      expect(axios.post).toHaveBeenCalledTimes(1)
      expect(axios.post).toHaveBeenCalledWith('http://notifier.test/send-admin-notification', expect.anything(), expect.anything())
    })

    it('does nothing while notifications are disabled', async () => {
      config.notifications.enabled = false

      dispatchOrderNotifications(payload)
      await flushImmediates()

      expect(axios.post).not.toHaveBeenCalled()
    })
  })
})
