export type { GitHubClientConfig } from '../types/github-client-config'
export type { SyncOutcome, SyncStatus } from '../types/sync-outcome'
export type { SyncErrorKind } from '../types/sync-error-kind'
export type { ReleaseRequest } from '../types/release-request'
export type { ReleaseResult } from '../types/release-result'
export type { SyncOptions } from '../types/sync-options'
export type { GitHubClient } from '../types/github-client'

export { sendDiscordNotification } from './notify/send-discord-notification'
export { ReleaseCreationError } from './errors/release-creation-error'
export { isValidRepository } from './validation/is-valid-repository'
export { createGitHubClient } from './api/create-github-client'
export { ValidationError } from './errors/validation-error'
export { TransportError } from './errors/transport-error'
export { NotFoundError } from './errors/not-found-error'
export { isValidToken } from './validation/is-valid-token'
export { isValidTag } from './validation/is-valid-tag'
export { needsUpdate } from './versions/needs-update'
export { syncRelease } from './sync/sync-release'
export { SyncError } from './errors/sync-error'
