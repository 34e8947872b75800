import { Either } from 'effect'

import { ClusterForbiddenError, ClusterUnauthorizedError } from './errors'
import type { ClusterRecord } from './types'

/** The authenticated identity behind a request. Controllers act system-wide. */
export type Caller = {
  readonly email: string
  readonly isController: boolean
}

export const DEFAULT_CONTROLLER_IDENTITIES = ['controller@system.local'] as const

export const resolveCaller = (
  identity: string | null | undefined,
  controllerIdentities: readonly string[],
): Either.Either<Caller, ClusterUnauthorizedError> => {
  const email = identity?.trim()
  if (!email) {
    return Either.left(new ClusterUnauthorizedError())
  }
  return Either.right({ email, isController: controllerIdentities.includes(email) })
}

// Users only reach clusters they created.
export const canAccessCluster = (caller: Caller, record: Pick<ClusterRecord, 'createdBy'>) =>
  caller.isController || record.createdBy === caller.email

export const ensureCanReportStatus = (caller: Caller): Either.Either<Caller, ClusterForbiddenError> =>
  caller.isController
    ? Either.right(caller)
    : Either.left(new ClusterForbiddenError(`caller ${caller.email} may not report controller status`))

/** Creator filter for a list: users are pinned to themselves, controllers may filter freely. */
export const scopeCreatedBy = (caller: Caller, requested: string | undefined) =>
  caller.isController ? requested || undefined : caller.email
