import { describe, expect, it } from 'vitest';
import { statusResponseSchema } from '@posrelay/schemas';
import { buildStatusResponse, escapeHtml, renderStatusPage } from '../status/page.js';

const players = [
  { id: 'bbbbbbbb', x: 3.14159, y: -2, lastSeen: 8_000 },
  { id: 'aaaaaaaa', x: 1, y: 2.5, lastSeen: 9_500 },
];

describe('status view', () => {
  it('renders players sorted by id with positions to two decimals', () => {
    const html = renderStatusPage(players, 10_000);

    expect(html).toBe(
      '<html><body><h1>Game Server Status</h1><p>Connected players: 2</p>' +
        "<table border='1'><tr><th>ID</th><th>Position</th><th>Last Seen</th></tr>" +
        '<tr><td>aaaaaaaa</td><td>(1.00, 2.50)</td><td>0.5s</td></tr>' +
        '<tr><td>bbbbbbbb</td><td>(3.14, -2.00)</td><td>2.0s</td></tr>' +
        '</table></body></html>',
    );
  });

  it('escapes markup in identifiers', () => {
    expect(escapeHtml(`<b id="x">&'`)).toBe('&lt;b id=&quot;x&quot;&gt;&amp;&#39;');
  });

  it('builds a JSON document that satisfies the status schema', () => {
    const response = buildStatusResponse(players, 10_000);

    expect(statusResponseSchema.parse(response)).toEqual({
      count: 2,
      generatedAt: '1970-01-01T00:00:10.000Z',
      players: [
        { id: 'aaaaaaaa', x: 1, y: 2.5, lastSeenMs: 500 },
        { id: 'bbbbbbbb', x: 3.14159, y: -2, lastSeenMs: 2_000 },
      ],
    });
  });
});
