import { describe, expect, it } from 'vitest'

import {
  deriveAggregateConditions,
  findDuplicateConditionTypes,
  hasTrueCondition,
  mergeReportedConditions,
  upsertCondition,
} from '@/clusters/conditions'
import type { Condition } from '@/clusters/types'

describe('cluster conditions', () => {
  it('upserts condition updates only when values change', () => {
    let tick = 0
    const nowIso = () => `2026-10-01T00:00:0${tick++}.000Z`
    const first = upsertCondition([], { type: 'Ready', status: 'True', reason: 'Valid' }, nowIso)
    const second = upsertCondition(first, { type: 'Ready', status: 'True', reason: 'Valid' }, nowIso)
    const third = upsertCondition(second, { type: 'Ready', status: 'False', reason: 'Invalid' }, nowIso)

    expect(first).toEqual([
      { type: 'Ready', status: 'True', reason: 'Valid', message: '', lastTransitionTime: '2026-10-01T00:00:00.000Z' },
    ])
    expect(second[0]?.lastTransitionTime).toBe('2026-10-01T00:00:00.000Z')
    expect(third[0]).toEqual({
      type: 'Ready',
      status: 'False',
      reason: 'Invalid',
      message: '',
      lastTransitionTime: '2026-10-01T00:00:01.000Z',
    })
  })

  it('defaults the reason when it is blank', () => {
    const [condition] = upsertCondition([], { type: 'Available', status: 'Unknown', reason: '  ' }, () => 'now')
    expect(condition?.reason).toBe('Reconciled')
  })

  it('keeps the previous transition time while a reported status holds', () => {
    const previous: Condition[] = [
      { type: 'Available', status: 'True', reason: 'Up', message: '', lastTransitionTime: '2026-10-01T00:00:00.000Z' },
      { type: 'Degraded', status: 'False', reason: 'Ok', message: '', lastTransitionTime: '2026-10-01T00:00:00.000Z' },
    ]

    const merged = mergeReportedConditions(
      previous,
      [
        { type: 'Degraded', status: 'True', reason: 'Quota' },
        { type: 'Available', status: 'True', reason: 'Up' },
        { type: 'Network', status: 'True', lastTransitionTime: '2026-09-30T00:00:00.000Z' },
      ],
      () => '2026-10-02T00:00:00.000Z',
    )

    expect(merged).toEqual([
      { type: 'Degraded', status: 'True', reason: 'Quota', message: '', lastTransitionTime: '2026-10-02T00:00:00.000Z' },
      { type: 'Available', status: 'True', reason: 'Up', message: '', lastTransitionTime: '2026-10-01T00:00:00.000Z' },
      {
        type: 'Network',
        status: 'True',
        reason: 'Reconciled',
        message: '',
        lastTransitionTime: '2026-09-30T00:00:00.000Z',
      },
    ])
  })

  it('reports duplicate condition types once each', () => {
    expect(
      findDuplicateConditionTypes([{ type: 'Available' }, { type: 'Ready' }, { type: 'Available' }, { type: 'Available' }]),
    ).toEqual(['Available'])
    expect(findDuplicateConditionTypes([{ type: 'Available' }])).toEqual([])
  })

  it('matches true conditions against a type list', () => {
    const conditions: Condition[] = [
      { type: 'Ready', status: 'True', reason: 'Up', message: '', lastTransitionTime: 'now' },
    ]
    expect(hasTrueCondition(conditions, ['Available', 'Ready'])).toBe(true)
    expect(hasTrueCondition(conditions, ['Available'])).toBe(false)
  })

  it('derives aggregate conditions from the cluster phase', () => {
    const pending = deriveAggregateConditions(
      [],
      { phase: 'Pending', reason: 'NoControllers', message: 'awaiting controller reconciliation' },
      () => '2026-10-01T00:00:00.000Z',
    )
    expect(pending.map((condition) => [condition.type, condition.status])).toEqual([
      ['Ready', 'False'],
      ['Progressing', 'True'],
      ['Degraded', 'False'],
    ])

    const unchanged = deriveAggregateConditions(
      pending,
      { phase: 'Pending', reason: 'NoControllers', message: 'awaiting controller reconciliation' },
      () => '2026-10-02T00:00:00.000Z',
    )
    expect(unchanged).toEqual(pending)

    const ready = deriveAggregateConditions(
      pending,
      { phase: 'Ready', reason: 'ControllersAvailable', message: '1 of 1 controllers available' },
      () => '2026-10-03T00:00:00.000Z',
    )
    expect(ready[0]).toEqual({
      type: 'Ready',
      status: 'True',
      reason: 'ControllersAvailable',
      message: '1 of 1 controllers available',
      lastTransitionTime: '2026-10-03T00:00:00.000Z',
    })
    expect(ready[1]?.status).toBe('False')
  })
})
