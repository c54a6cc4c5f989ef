/**
 * Order e-mails: a confirmation for the guest and an alert for the front desk.
 */
import type { OrderNotificationPayload } from '../services/notification.service'

export interface RenderedMail {
  subject: string
  html: string
  text: string
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch)
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`
}

function itemsHtml(order: OrderNotificationPayload, withType: boolean): string {
  return order.items.map(item => {
    const stay = item.item_type === 'room' && item.check_in_date && item.check_out_date
      ? `<br>Check-in: ${escapeHtml(item.check_in_date)}<br>Check-out: ${escapeHtml(item.check_out_date)}<br>Nights: ${item.nights ?? 1}`
      : ''
    const type = withType ? ` (${item.item_type})` : ''
    return `
      <div style="border-bottom:1px solid #eee;padding:10px 0">
        <strong>${escapeHtml(item.item_name)}</strong>${type}${stay}
        <br>Quantity: ${item.quantity}
        <br>Price: ${formatMoney(item.total_price)}
      </div>`
  }).join('')
}

function notesHtml(order: OrderNotificationPayload): string {
  return order.notes
    ? `<h3>Special Notes</h3><p>${escapeHtml(order.notes)}</p>`
    : ''
}

export function renderOrderConfirmation(order: OrderNotificationPayload): RenderedMail {
  const html = `
    <div style="font-family:Arial,sans-serif;max-width:600px;margin:0 auto">
      <div style="background:#2c3e50;color:#fff;padding:20px;text-align:center">
        <h1>Order Confirmation</h1>
        <p>Thank you for your booking!</p>
      </div>
      <div style="padding:20px;background:#f8f9fa">
        <h2>Hello ${escapeHtml(order.customer_name)}!</h2>
        <p><strong>Order Number:</strong> ${escapeHtml(order.order_number)}</p>
        <p><strong>Status:</strong> ${escapeHtml(order.status)}</p>
        <h3>Items Ordered</h3>
        ${itemsHtml(order, false)}
        <p style="font-weight:bold;font-size:18px">Total Amount: ${formatMoney(order.total_amount)}</p>
        ${notesHtml(order)}
      </div>
    </div>`

  return {
    subject: `Order Confirmation - ${order.order_number}`,
    html,
    text: `Hello ${order.customer_name}, your order ${order.order_number} for ${formatMoney(order.total_amount)} has been received.`,
  }
}

export function renderAdminNotification(order: OrderNotificationPayload): RenderedMail {
  const html = `
    <div style="font-family:Arial,sans-serif;max-width:600px;margin:0 auto">
      <div style="background:#e74c3c;color:#fff;padding:20px;text-align:center">
        <h1>New Order Received</h1>
      </div>
      <div style="padding:20px;background:#f8f9fa">
        <p><strong>Order Number:</strong> ${escapeHtml(order.order_number)}</p>
        <p><strong>Status:</strong> ${escapeHtml(order.status)}</p>
        <p><strong>Total Amount:</strong> ${formatMoney(order.total_amount)}</p>
        <h3>Customer</h3>
        <p>${escapeHtml(order.customer_name)}<br>${escapeHtml(order.customer_phone)}<br>${escapeHtml(order.customer_email ?? '-')}</p>
        <h3>Items Ordered</h3>
        ${itemsHtml(order, true)}
        ${notesHtml(order)}
      </div>
    </div>`

  return {
    subject: `New Order: ${order.order_number} - ${formatMoney(order.total_amount)}`,
    html,
    text: `New order received: ${order.order_number} from ${order.customer_name} - ${formatMoney(order.total_amount)}`,
  }
}
