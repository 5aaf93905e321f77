import got from 'got';

// One attempt per run: failed calls surface to the caller instead of retrying.
export const http = got.extend({
  timeout: 15000,
  retry: { limit: 0 },
  throwHttpErrors: false,
  headers: { accept: 'application/json' },
});
