export const NATS_CONNECTION = 'NATS_CONNECTION';
export const LEDGER_TOPICS = 'LEDGER_TOPICS';
export const LOGGER = 'LOGGER';
export const EVENT_PUBLISHER = 'EVENT_PUBLISHER';
export const COMMAND_SUBSCRIBER = 'COMMAND_SUBSCRIBER';
