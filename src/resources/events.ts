import { defineResource } from "../resource/defineResource";

export const Events = defineResource("Events", (r) => ({
  list: r.list(),
  retrieve: r.retrieve(),
}));
