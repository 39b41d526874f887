import type { AnnouncementBuilder } from './types.js'

export const plainTextAnnouncements: AnnouncementBuilder = {
  artifactChanged: (_url, result) => `New artifact available: ${result.link}`,
  fetchFailing: streak =>
    `Fetching ${streak.url} failed ${streak.consecutiveFailures} times in a row: ${streak.reason}`,
  recovered: streak =>
    `Fetching ${streak.url} works again after ${streak.consecutiveFailures} failed attempts`,
  unexpectedError: (url, error, fatal) =>
    `${fatal ? 'Fatal' : 'Unhandled'} error while checking ${url}: ${error.message}`,
}
