import { defineResource } from "../resource/defineResource";

export const PendingTransactions = defineResource("PendingTransactions", (r) => ({
  list: r.list(),
  retrieve: r.retrieve(),
}));
