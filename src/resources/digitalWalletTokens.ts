import { defineResource } from "../resource/defineResource";

export const DigitalWalletTokens = defineResource("DigitalWalletTokens", (r) => ({
  list: r.list(),
  retrieve: r.retrieve(),
}));
