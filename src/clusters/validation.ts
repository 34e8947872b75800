import { Either, ParseResult, Schema } from 'effect'

import { findDuplicateConditionTypes } from './conditions'
import { ClusterInvalidError } from './errors'
import type { ControllerReportInput } from './record'

const MAX_NAME_LENGTH = 63

const RequiredString = Schema.Trim.pipe(Schema.minLength(1, { message: () => 'must not be empty' }))

const OpaqueFields = Schema.Record({ key: Schema.String, value: Schema.Unknown })

const PlatformSpecSchema = Schema.Struct({ type: RequiredString }, OpaqueFields)

export const ClusterSpecSchema = Schema.Struct({ platform: PlatformSpecSchema }, OpaqueFields)

export const CreateClusterInputSchema = Schema.Struct({
  name: RequiredString.pipe(
    Schema.maxLength(MAX_NAME_LENGTH, { message: () => `must be at most ${MAX_NAME_LENGTH} characters` }),
  ),
  spec: ClusterSpecSchema,
})

const Generation = Schema.Int.pipe(Schema.positive({ message: () => 'must be a positive integer' }))

export const UpdateSpecInputSchema = Schema.Struct({
  spec: ClusterSpecSchema,
  expectedGeneration: Schema.optional(Generation),
})

const ConditionSchema = Schema.Struct({
  type: RequiredString,
  status: Schema.Literal('True', 'False', 'Unknown'),
  reason: Schema.optional(Schema.String),
  message: Schema.optional(Schema.String),
  lastTransitionTime: Schema.optional(Schema.String),
})

const ControllerErrorSchema = Schema.Struct({
  message: RequiredString,
  errorType: Schema.optional(Schema.Literal('Transient', 'Configuration', 'Fatal', 'System')),
  errorCode: Schema.optional(Schema.String),
  userActionable: Schema.optional(Schema.Boolean),
  suggestions: Schema.optional(Schema.Array(Schema.String)),
  details: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.String })),
})

export const ControllerReportInputSchema = Schema.Struct({
  controllerName: RequiredString,
  observedGeneration: Generation,
  conditions: Schema.optionalWith(Schema.Array(ConditionSchema), { default: () => [] }),
  metadata: Schema.optional(OpaqueFields),
  lastError: Schema.optional(Schema.NullOr(ControllerErrorSchema)),
})

const formatIssues = (error: ParseResult.ParseError) =>
  ParseResult.ArrayFormatter.formatErrorSync(error).map((issue) =>
    issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message,
  )

const decodeWith =
  <A, I>(schema: Schema.Schema<A, I>, label: string) =>
  (input: unknown): Either.Either<A, ClusterInvalidError> =>
    Schema.decodeUnknownEither(schema)(input).pipe(
      Either.mapLeft((error) => new ClusterInvalidError(`invalid ${label}`, formatIssues(error))),
    )

export const decodeCreateClusterInput = decodeWith(CreateClusterInputSchema, 'cluster')

export const decodeUpdateSpecInput = decodeWith(UpdateSpecInputSchema, 'spec update')

export const decodeControllerReport = (input: unknown): Either.Either<ControllerReportInput, ClusterInvalidError> =>
  Either.flatMap(decodeWith(ControllerReportInputSchema, 'controller report')(input), (report) => {
    const duplicates = findDuplicateConditionTypes(report.conditions)
    if (duplicates.length > 0) {
      return Either.left(
        new ClusterInvalidError(
          'invalid controller report',
          duplicates.map((type) => `conditions: duplicate condition type "${type}"`),
        ),
      )
    }
    return Either.right(report)
  })
