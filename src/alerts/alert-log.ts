/**
 * Alert Log
 *
 * Append-only log of classified deltas, kept in the history store. Alerts
 * carry their old and new values, so they stay meaningful after the runs
 * they compare are pruned.
 *
 * @module alerts/alert-log
 */

import { DEFAULT_ALERT_LIMIT } from '../constants'
import type { HistoryStore } from '../history/store'
import type { AlertSeverity, NewRegressionAlert, RegressionAlert } from '../types/benchmark'
import { logger } from '../utils/logger'

export interface AlertQuery {
  severity?: AlertSeverity | undefined
  framework?: string | undefined
  /** Only alerts raised at or after this instant */
  since?: Date | undefined
  limit?: number | undefined
}

export class AlertLog {
  constructor(private readonly store: HistoryStore) {}

  /**
   * Append an alert and return it with its id
   */
  emit(alert: NewRegressionAlert): RegressionAlert {
    const id = this.store.insertAlert(alert)
    if (alert.alertType === 'regression') {
      logger.warn(`[${alert.severity}] ${alert.message}`)
    } else {
      logger.info(`[${alert.severity}] ${alert.message}`)
    }
    return { ...alert, id }
  }

  /**
   * Alerts newest first
   */
  list(query: AlertQuery = {}): RegressionAlert[] {
    return this.store.listAlerts({
      severity: query.severity,
      framework: query.framework,
      since: query.since,
      limit: query.limit ?? DEFAULT_ALERT_LIMIT,
    })
  }
}
