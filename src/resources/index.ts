export { Events } from "./events";
export { EventSubscriptions } from "./eventSubscriptions";
export { PendingTransactions } from "./pendingTransactions";
export { DigitalWalletTokens } from "./digitalWalletTokens";
