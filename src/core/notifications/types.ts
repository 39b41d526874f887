export type NotificationPayload = string | {
  content?: string
  embeds?: unknown[]
}

export interface Notifier {
  readonly name: string
  send(payload: NotificationPayload): Promise<void>
}
