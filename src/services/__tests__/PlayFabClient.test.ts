import test from 'node:test';
import assert from 'node:assert/strict';

import PlayFabClient from '../PlayFabClient';

interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: Record<string, string>;
  body: unknown;
}

function recordingFetch(respond: () => Response | Promise<Response>): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const body = init?.body;
    requests.push({
      url: String(input),
      method: init?.method,
      headers,
      body: typeof body === 'string' ? JSON.parse(body) : null,
    });
    return respond();
  };
  return { fetchImpl, requests };
}

function liveClient(fetchImpl: typeof fetch, sessionToken = 'test-session'): PlayFabClient {
  return new PlayFabClient({
    baseUrl: 'https://playfab.test/',
    sessionToken,
    executeRequests: true,
    fetchImpl,
  });
}

const SAMPLE_BODY = {
  code: 200,
  status: 'OK',
  data: {
    Leaderboard: [
      {
        PlayFabId: 'AAA',
        DisplayName: 'Alice',
        Position: 0,
        StatValue: 950,
        Profile: {
          DisplayName: 'Alice',
          LinkedAccounts: [{ Platform: 'Custom', PlatformUserId: '[GOG]12345' }],
        },
      },
      { PlayFabId: 'BBB', Position: 1, StatValue: 900 },
    ],
    Version: 31,
  },
};

test('dry-run mode never calls fetch', async () => {
  const { fetchImpl, requests } = recordingFetch(() => new Response('{}'));
  const client = new PlayFabClient({ baseUrl: 'https://playfab.test', sessionToken: 'test-session', fetchImpl });

  const result = await client.fetchPage('DailyPlay_Mon', 0, 50);

  assert.equal(client.isDryRun(), true);
  assert.deepEqual(result, { ok: true, value: { dryRun: true, entries: [], version: null } });
  assert.equal(requests.length, 0);
});

test('fetchPage posts the leaderboard request and maps entries', async () => {
  const { fetchImpl, requests } = recordingFetch(() => new Response(JSON.stringify(SAMPLE_BODY), { status: 200 }));
  const result = await liveClient(fetchImpl).fetchPage('DailyPlay_Mon', 100, 50);

  assert.equal(requests.length, 1);
  const [request] = requests;
  assert.equal(request?.url, 'https://playfab.test/Client/GetLeaderboard');
  assert.equal(request?.method, 'POST');
  assert.equal(request?.headers['x-authorization'], 'test-session');
  assert.equal(request?.headers['content-type'], 'application/json');
  assert.deepEqual(request?.body, {
    StatisticName: 'DailyPlay_Mon',
    StartPosition: 100,
    MaxResultsCount: 50,
    ProfileConstraints: { ShowDisplayName: true, ShowLinkedAccounts: true },
  });

  assert.ok(result.ok);
  assert.equal(result.value.dryRun, false);
  assert.equal(result.value.version, 31);
  assert.deepEqual(result.value.entries, [
    {
      playfabId: 'AAA',
      displayName: 'Alice',
      position: 0,
      statValue: 950,
      profile: {
        displayName: 'Alice',
        linkedAccounts: [{ platform: 'Custom', platformUserId: '[GOG]12345' }],
      },
    },
    {
      playfabId: 'BBB',
      displayName: null,
      position: 1,
      statValue: 900,
      profile: { displayName: null, linkedAccounts: [] },
    },
  ]);
});

test('fetchAroundPlayer targets the around-player endpoint', async () => {
  const { fetchImpl, requests } = recordingFetch(() => new Response(JSON.stringify(SAMPLE_BODY), { status: 200 }));
  const result = await liveClient(fetchImpl).fetchAroundPlayer('DailyPlay_Tues', 'AAA', 5);

  assert.ok(result.ok);
  assert.equal(requests[0]?.url, 'https://playfab.test/Client/GetLeaderboardAroundPlayer');
  assert.deepEqual(requests[0]?.body, {
    StatisticName: 'DailyPlay_Tues',
    PlayFabId: 'AAA',
    MaxResultsCount: 5,
    ProfileConstraints: { ShowDisplayName: true, ShowLinkedAccounts: true },
  });
});

test('an empty session token fails before any request', async () => {
  const { fetchImpl, requests } = recordingFetch(() => new Response('{}'));
  const result = await liveClient(fetchImpl, '').fetchPage('DailyPlay_Mon', 0, 50);

  assert.equal(requests.length, 0);
  assert.equal(result.ok, false);
  assert.equal(!result.ok && result.error.kind, 'missing-credential');
});

test('HTTP 401 is reported as unauthorized and its body is released', async () => {
  const response = new Response('{"error":"NotAuthenticated"}', { status: 401 });
  const { fetchImpl } = recordingFetch(() => response);
  const result = await liveClient(fetchImpl).fetchPage('DailyPlay_Mon', 0, 50);

  assert.ok(!result.ok);
  assert.equal(result.error.kind, 'unauthorized');
  assert.equal(result.error.status, 401);
  assert.equal(response.bodyUsed, true);
});

test('other non-200 statuses carry the status and body excerpt', async () => {
  const { fetchImpl } = recordingFetch(() => new Response('Service Unavailable', { status: 503 }));
  const result = await liveClient(fetchImpl).fetchPage('DailyPlay_Mon', 0, 50);

  assert.ok(!result.ok);
  assert.equal(result.error.kind, 'http-status');
  assert.equal(result.error.status, 503);
  assert.equal(result.error.message, 'API request failed with status 503: Service Unavailable');
});

test('invalid JSON is a malformed body', async () => {
  const { fetchImpl } = recordingFetch(() => new Response('<html>', { status: 200 }));
  const result = await liveClient(fetchImpl).fetchPage('DailyPlay_Mon', 0, 50);

  assert.ok(!result.ok);
  assert.equal(result.error.kind, 'malformed-body');
});

test('a body without data.Leaderboard is a malformed body', async () => {
  const { fetchImpl } = recordingFetch(() => new Response('{"code":200,"data":{}}', { status: 200 }));
  const result = await liveClient(fetchImpl).fetchPage('DailyPlay_Mon', 0, 50);

  assert.ok(!result.ok);
  assert.equal(result.error.kind, 'malformed-body');
  assert.equal(result.error.message, 'Unexpected response body (data.Leaderboard: Required)');
});

test('a rejected fetch is a transport failure', async () => {
  const { fetchImpl } = recordingFetch(() => {
    throw new Error('connect ECONNREFUSED');
  });
  const result = await liveClient(fetchImpl).fetchPage('DailyPlay_Mon', 0, 50);

  assert.ok(!result.ok);
  assert.equal(result.error.kind, 'transport');
  assert.equal(result.error.message, 'connect ECONNREFUSED');
});
