import type { AlertCondition, AlertConfig, AlertKey, EnvironmentReading } from '../types/grow'

function formatBound(value: number) {
  return Number.isInteger(value) ? value.toFixed(1) : String(value)
}

/** Conditions the reading breaches, before any throttling. */
export function detectAlertConditions(reading: EnvironmentReading, config: AlertConfig): AlertCondition[] {
  if (!config.enabled) {
    return []
  }

  const conditions: AlertCondition[] = []
  const temperature = reading.temperature
  const humidity = reading.humidity

  if (config.tempMin != null && temperature < config.tempMin) {
    conditions.push({
      key: 'temp_low',
      message: `Temperature too LOW: ${temperature.toFixed(1)}°C (min: ${formatBound(config.tempMin)}°C)`,
    })
  } else if (config.tempMax != null && temperature > config.tempMax) {
    conditions.push({
      key: 'temp_high',
      message: `Temperature too HIGH: ${temperature.toFixed(1)}°C (max: ${formatBound(config.tempMax)}°C)`,
    })
  }

  if (config.humidityMin != null && humidity < config.humidityMin) {
    conditions.push({
      key: 'humidity_low',
      message: `Humidity too LOW: ${humidity.toFixed(1)}% (min: ${formatBound(config.humidityMin)}%)`,
    })
  } else if (config.humidityMax != null && humidity > config.humidityMax) {
    conditions.push({
      key: 'humidity_high',
      message: `Humidity too HIGH: ${humidity.toFixed(1)}% (max: ${formatBound(config.humidityMax)}%)`,
    })
  }

  return conditions
}

/**
 * Remembers when each alert key was last emitted and holds back repeats
 * inside the configured notification interval.
 */
export class AlertThrottler {
  private readonly lastSentAt = new Map<AlertKey, number>()

  check(reading: EnvironmentReading, config: AlertConfig, now: number): AlertCondition[] {
    const intervalMs = Math.max(0, config.notificationIntervalSec) * 1000
    const fired: AlertCondition[] = []

    for (const condition of detectAlertConditions(reading, config)) {
      const lastSent = this.lastSentAt.get(condition.key)
      if (lastSent != null && now - lastSent < intervalMs) {
        continue
      }
      this.lastSentAt.set(condition.key, now)
      fired.push(condition)
    }

    return fired
  }

  getLastSentAt(key: AlertKey) {
    return this.lastSentAt.get(key) ?? null
  }
}
