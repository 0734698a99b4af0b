/**
 * Event rendering for each channel's markup
 */

import type { ChangeEvent } from '../detect';
import type { MessageFormat } from '../notifiers/types';
import type { LiveSnapshot } from '../sources';

type Inline = string | { bold: string } | { link: string; label: string };
type Line = Inline[];

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

// Slack only reserves these three
function escapeMrkdwn(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function renderInline(part: Inline, format: MessageFormat): string {
  if (typeof part === 'string') {
    switch (format) {
      case 'html':
        return escapeHtml(part);
      case 'mrkdwn':
        return escapeMrkdwn(part);
      case 'plain':
        return part;
    }
  }
  if ('bold' in part) {
    switch (format) {
      case 'html':
        return `<b>${escapeHtml(part.bold)}</b>`;
      case 'mrkdwn':
        return `*${escapeMrkdwn(part.bold)}*`;
      case 'plain':
        return part.bold;
    }
  }
  switch (format) {
    case 'html':
      return `<a href="${escapeHtml(part.link)}">${escapeHtml(part.label)}</a>`;
    case 'mrkdwn':
      return `<${part.link}|${escapeMrkdwn(part.label).replace(/\|/g, '∣')}>`;
    case 'plain':
      return part.label === part.link
        ? part.link
        : `${part.label} ${part.link}`;
  }
}

function renderLines(lines: Line[], format: MessageFormat): string {
  return lines
    .map((line) => line.map((part) => renderInline(part, format)).join(''))
    .join('\n');
}

function textLines(text: string): Line[] {
  return text
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => [line]);
}

/** Who a live message is about */
export interface LiveSubject {
  name: string;
  platform: string;
}

// Newest title first
function liveLines(subject: LiveSubject, live: LiveSnapshot, titles: string[]): Line[] {
  const header: Line = live.online
    ? ['🔴 ', { bold: subject.name }, ` is live on ${subject.platform}`]
    : ['⚫ ', { bold: subject.name }, ` went offline on ${subject.platform}`];
  const label = titles.filter((title) => title.length > 0).join(' ⬅️ ');
  return [header, [{ link: live.url, label: label || live.url }]];
}

function describe(event: ChangeEvent): Line[] {
  switch (event.kind) {
    case 'LiveStarted':
    case 'LiveEnded':
      return liveLines(event, event.payload.live, [event.payload.live.title]);
    case 'LiveTitleChanged': {
      const { live, previousTitle } = event.payload;
      return [
        ['✏️ ', { bold: event.name }, ` changed the live title on ${event.platform}`],
        [`${previousTitle} → ${live.title}`],
        [{ link: live.url, label: live.url }],
      ];
    }
    case 'NewItem': {
      const { item } = event.payload;
      const author = item.author ?? event.name;
      const lines: Line[] = [];
      if (item.repostOf) {
        const from = item.repostOf.author ? ` from ${item.repostOf.author}` : '';
        lines.push(['🔁 ', { bold: author }, ` reposted${from} on ${event.platform}`]);
      } else {
        const pinned = item.pinned ? ' (pinned)' : '';
        lines.push(['📝 ', { bold: author }, ` posted on ${event.platform}${pinned}`]);
      }
      lines.push(...textLines(item.text));
      if (item.repostOf) {
        lines.push(...textLines(item.repostOf.text).map((line) => ['> ', ...line]));
      }
      lines.push([{ link: item.url, label: item.url }]);
      return lines;
    }
    case 'Log':
      return [
        [{ bold: `[${event.payload.level}]` }, ` ${event.name}`],
        ...textLines(event.payload.message),
      ];
  }
}

/**
 * Render an event as a message body in the given markup
 */
export function renderEvent(event: ChangeEvent, format: MessageFormat): string {
  return renderLines(describe(event), format);
}

/**
 * Render the running summary of one live session: online or offline header
 * and every title it has had, newest first. Channels that edit their
 * earlier live message use this as the replacement text.
 */
export function renderLiveSummary(
  subject: LiveSubject,
  live: LiveSnapshot,
  titles: string[],
  format: MessageFormat
): string {
  return renderLines(liveLines(subject, live, titles), format);
}
