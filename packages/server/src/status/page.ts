import type { StatusResponse } from '@posrelay/schemas';
import type { PlayerRecord } from '../relay/types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (character) => HTML_ESCAPES[character] ?? character);

const formatAge = (ageMs: number): string => `${(ageMs / 1000).toFixed(1)}s`;

const sortById = (players: PlayerRecord[]): PlayerRecord[] =>
  [...players].sort((a, b) => a.id.localeCompare(b.id));

export const buildStatusResponse = (players: PlayerRecord[], now: number): StatusResponse => ({
  count: players.length,
  generatedAt: new Date(now).toISOString(),
  players: sortById(players).map((player) => ({
    id: player.id,
    x: player.x,
    y: player.y,
    lastSeenMs: Math.max(0, now - player.lastSeen),
  })),
});

export const renderStatusPage = (players: PlayerRecord[], now: number): string => {
  const rows = sortById(players)
    .map(
      (player) =>
        `<tr><td>${escapeHtml(player.id)}</td>` +
        `<td>(${player.x.toFixed(2)}, ${player.y.toFixed(2)})</td>` +
        `<td>${formatAge(Math.max(0, now - player.lastSeen))}</td></tr>`,
    )
    .join('');

  return [
    '<html><body>',
    '<h1>Game Server Status</h1>',
    `<p>Connected players: ${players.length}</p>`,
    "<table border='1'><tr><th>ID</th><th>Position</th><th>Last Seen</th></tr>",
    rows,
    '</table></body></html>',
  ].join('');
};
