export * from './blocking-consumer/blocking-consumer.js';
export * from './blocking-consumer/functions/from-accept-function/blocking-consumer-from-accept-function.js';
export * from './blocking-consumer/functions/map/map-blocking-consumer.js';
export * from './buffered-blocking-consumer/buffered-blocking-consumer.js';
export * from './buffered-blocking-consumer/built-in/buffer-last/buffer-last-blocking-consumer.js';
export * from './buffered-blocking-consumer/built-in/serialized/serialized-buffered-blocking-consumer.js';
export * from './shared/accept-result/accept-result.js';
export * from './shared/interrupted-error.js';
