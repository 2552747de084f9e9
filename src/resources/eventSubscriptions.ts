import { defineResource } from "../resource/defineResource";

/**
 * Webhook subscriptions. Updating one changes its status or target URL.
 */
export const EventSubscriptions = defineResource("EventSubscriptions", (r) => ({
  create: r.create(),
  list: r.list(),
  update: r.update(),
  retrieve: r.retrieve(),
}));
