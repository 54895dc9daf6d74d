/** Defaults applied to every client unless overridden. */
export let defaultClientConfig = Object.freeze({
  baseUrl: 'https://api.github.com',
  userAgent: 'upstream-release',
  apiVersion: '2022-11-28',
  timeout: 10_000,
})
