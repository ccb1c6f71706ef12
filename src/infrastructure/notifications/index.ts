export { createLogNotifier, createOutboxNotifier, type OutboxNotifier } from "./log-notifier.js";
