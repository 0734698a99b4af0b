/**
 * Reporter module
 *
 * - LogReporter: forwards warnings and errors to chat
 * - HeartbeatReporter: periodic HTTP ping
 */

export { HeartbeatReporter } from './heartbeat';
export { LOG_REPORTER_SOURCE, type LogRouter, LogReporter } from './log';
