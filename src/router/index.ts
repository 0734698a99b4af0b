/**
 * Router module
 *
 * Resolves notify references, renders events and hands them to channels.
 */

export { type LiveSubject, renderEvent, renderLiveSummary } from './render';
export { resolveNotifyRef } from './resolve';
export { type DeliveryReport, NotificationRouter } from './router';
