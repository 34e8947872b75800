export type ClusterPhase = 'Pending' | 'Progressing' | 'Ready' | 'Failed' | 'Terminating'

export const CLUSTER_PHASES: readonly ClusterPhase[] = ['Pending', 'Progressing', 'Ready', 'Failed', 'Terminating']

export type ConditionStatus = 'True' | 'False' | 'Unknown'

export type Condition = {
  readonly type: string
  readonly status: ConditionStatus
  readonly reason: string
  readonly message: string
  readonly lastTransitionTime: string
}

export type PlatformSpec = {
  readonly type: string
  readonly [key: string]: unknown
}

export type ClusterSpec = {
  readonly platform: PlatformSpec
  readonly [key: string]: unknown
}

export type ControllerErrorType = 'Transient' | 'Configuration' | 'Fatal' | 'System'

export type ControllerError = {
  readonly message: string
  readonly errorType?: ControllerErrorType
  readonly errorCode?: string
  readonly userActionable?: boolean
  readonly suggestions?: readonly string[]
  readonly details?: Readonly<Record<string, string>>
}

export type ControllerReport = {
  readonly controllerName: string
  readonly observedGeneration: number
  readonly conditions: readonly Condition[]
  readonly metadata: Readonly<Record<string, unknown>>
  readonly lastError: ControllerError | null
  readonly receivedAt: string
}

export type ClusterStatus = {
  readonly phase: ClusterPhase
  readonly reason: string
  readonly message: string
  readonly observedGeneration: number
  readonly conditions: readonly Condition[]
  readonly lastUpdateTime: string
}

export type ClusterRecord = {
  readonly id: string
  readonly name: string
  readonly spec: ClusterSpec
  readonly generation: number
  readonly createdBy: string
  readonly createdAt: string
  readonly updatedAt: string
  readonly deletionRequestedAt: string | null
  readonly status: ClusterStatus
  readonly reports: Readonly<Record<string, ControllerReport>>
}

export type ClusterFilter = {
  readonly platform?: string
  readonly phase?: ClusterPhase
  readonly createdBy?: string
}

export type ClusterListQuery = ClusterFilter & {
  readonly limit: number
  readonly offset: number
}

export type ClusterPage = {
  readonly records: readonly ClusterRecord[]
  readonly total: number
}

export type ControllerReportView = ControllerReport & {
  readonly stale: boolean
}

export type ControllerCounts = {
  readonly total: number
  readonly reconciled: number
  readonly available: number
  readonly failed: number
  readonly stale: readonly string[]
}

export type ClusterStatusView = {
  readonly id: string
  readonly name: string
  readonly generation: number
  readonly phase: ClusterPhase
  readonly reason: string
  readonly message: string
  readonly observedGeneration: number
  readonly conditions: readonly Condition[]
  readonly controllers: readonly ControllerReportView[]
  readonly counts: ControllerCounts
  readonly lastUpdateTime: string
}

/** Outcome of a read-modify-write against one stored cluster. */
export type ClusterMutation = { readonly type: 'replace'; readonly record: ClusterRecord } | { readonly type: 'remove' }
