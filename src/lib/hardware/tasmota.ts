import mqtt from 'mqtt'
import type { IClientOptions } from 'mqtt'
import type { EnvironmentReading } from '../../types/grow'
import {
  buildPowerCommand,
  getRelaySubscribeTopics,
  getSensorSubscribeTopics,
  parseTasmotaMessage,
} from '../tasmota'
import type { Actuator, DeviceStates, SensorSource } from './types'

export type MessageHandler = (topic: string, payload: string) => void

/** The slice of an MQTT client the Tasmota collaborators use. */
export interface MqttTransport {
  waitUntilConnected(timeoutMs: number): Promise<void>
  subscribe(topics: string[]): Promise<void>
  publish(topic: string, payload: string): Promise<void>
  onMessage(handler: MessageHandler): () => void
  end(): Promise<void>
}

export type MqttConnectionConfig = {
  url: string
  username?: string
  password?: string
  clientIdPrefix: string
}

export function createMqttTransport(config: MqttConnectionConfig): MqttTransport {
  const options: IClientOptions = {
    clientId: `${config.clientIdPrefix}-${crypto.randomUUID().slice(0, 8)}`,
    username: config.username || undefined,
    password: config.password || undefined,
    reconnectPeriod: 2000,
    clean: true,
  }

  const client = mqtt.connect(config.url, options)
  const handlers = new Set<MessageHandler>()

  client.on('connect', () => {
    console.log(`[hardware] MQTT connected to ${config.url}`)
  })

  client.on('message', (topic, payloadBuffer) => {
    const payloadText = payloadBuffer.toString('utf-8')
    for (const handler of handlers) {
      try {
        handler(topic, payloadText)
      } catch (error) {
        console.error(`[hardware] MQTT handler failed for ${topic}`, error)
      }
    }
  })

  client.on('error', (error) => {
    console.error('[hardware] MQTT error', error.message)
  })

  return {
    waitUntilConnected(timeoutMs) {
      if (client.connected) {
        return Promise.resolve()
      }
      return new Promise<void>((resolve, reject) => {
        const onConnect = () => {
          clearTimeout(timer)
          resolve()
        }
        const timer = setTimeout(() => {
          client.off('connect', onConnect)
          reject(new Error(`MQTT_CONNECT_TIMEOUT: no connection to ${config.url} within ${timeoutMs}ms`))
        }, timeoutMs)
        client.once('connect', onConnect)
      })
    },
    subscribe(topics) {
      return new Promise<void>((resolve, reject) => {
        client.subscribe(topics, { qos: 1 }, (error) => {
          if (error) {
            reject(error)
            return
          }
          resolve()
        })
      })
    },
    publish(topic, payload) {
      return new Promise<void>((resolve, reject) => {
        client.publish(topic, payload, { qos: 1, retain: false }, (error) => {
          if (error) {
            reject(error)
            return
          }
          resolve()
        })
      })
    },
    onMessage(handler) {
      handlers.add(handler)
      return () => {
        handlers.delete(handler)
      }
    },
    end() {
      return new Promise<void>((resolve) => {
        client.end(true, {}, () => resolve())
      })
    },
  }
}

export type TasmotaRelayOptions = {
  deviceTopic: string
  /** device name -> `POWERn` */
  channels: Record<string, string>
  connectTimeoutMs?: number
  clock?: () => number
}

/**
 * Relay board running Tasmota. Commands go to `cmnd/<topic>/POWERn`; the state
 * cache follows `stat` and `tele/STATE` reports so manual switching at the
 * board is picked up.
 */
export class TasmotaRelayActuator implements Actuator {
  readonly kind = 'tasmota'
  private readonly cache = new Map<string, boolean | null>()
  private readonly deviceByChannel = new Map<string, string>()
  private detach: (() => void) | null = null

  constructor(
    private readonly transport: MqttTransport,
    private readonly options: TasmotaRelayOptions,
  ) {
    for (const [deviceName, channel] of Object.entries(options.channels)) {
      this.cache.set(deviceName, null)
      this.deviceByChannel.set(channel, deviceName)
    }
  }

  async open() {
    await this.transport.waitUntilConnected(this.options.connectTimeoutMs ?? 10_000)
    this.detach = this.transport.onMessage((topic, payload) => this.handleMessage(topic, payload))
    await this.transport.subscribe(getRelaySubscribeTopics(this.options.deviceTopic))
    // ask the board to report every relay
    await this.transport.publish(`cmnd/${this.options.deviceTopic}/STATE`, '')
    console.log(`[hardware] Tasmota relay board ${this.options.deviceTopic} ready with ${this.cache.size} channels`)
  }

  async close() {
    for (const deviceName of this.cache.keys()) {
      await this.set(deviceName, false)
    }
    this.detach?.()
    this.detach = null
  }

  async set(deviceName: string, on: boolean) {
    const channel = this.options.channels[deviceName]
    if (!channel) {
      return false
    }

    const command = buildPowerCommand(this.options.deviceTopic, channel, on)
    try {
      await this.transport.publish(command.topic, command.payload)
    } catch (error) {
      console.error(`[hardware] Failed to switch ${deviceName} ${command.payload}`, error)
      return false
    }

    this.cache.set(deviceName, on)
    return true
  }

  get(deviceName: string) {
    return this.cache.get(deviceName) ?? null
  }

  has(deviceName: string) {
    return this.cache.has(deviceName)
  }

  states(): DeviceStates {
    return Object.fromEntries(this.cache)
  }

  private handleMessage(topic: string, payload: string) {
    const clock = this.options.clock ?? Date.now
    const message = parseTasmotaMessage(this.options.deviceTopic, topic, payload, clock())
    if (!message) {
      return
    }

    if (message.type === 'lwt' && !message.online) {
      console.warn(`[hardware] Tasmota relay board ${this.options.deviceTopic} went offline`)
      for (const deviceName of this.cache.keys()) {
        this.cache.set(deviceName, null)
      }
      return
    }

    if (message.type !== 'power') {
      return
    }

    for (const update of message.updates) {
      const deviceName = this.deviceByChannel.get(update.channel)
      if (deviceName) {
        this.cache.set(deviceName, update.power === 'ON')
      }
    }
  }
}

export type TasmotaSensorOptions = {
  deviceTopic: string
  maxAgeMs: number
  connectTimeoutMs?: number
  clock?: () => number
}

/** BME680 telemetry published by Tasmota on `tele/<topic>/SENSOR`. */
export class TasmotaSensorSource implements SensorSource {
  readonly kind = 'tasmota'
  private latest: EnvironmentReading | null = null
  private detach: (() => void) | null = null

  constructor(
    private readonly transport: MqttTransport,
    private readonly options: TasmotaSensorOptions,
  ) {}

  async open() {
    await this.transport.waitUntilConnected(this.options.connectTimeoutMs ?? 10_000)
    this.detach = this.transport.onMessage((topic, payload) => this.handleMessage(topic, payload))
    await this.transport.subscribe(getSensorSubscribeTopics(this.options.deviceTopic))
    // STATUS 10 answers with the current sensor values instead of waiting for TelePeriod
    await this.transport.publish(`cmnd/${this.options.deviceTopic}/STATUS`, '10')
  }

  async close() {
    this.detach?.()
    this.detach = null
  }

  async read() {
    if (!this.latest) {
      return null
    }
    const age = this.now() - this.latest.capturedAt
    return age <= this.options.maxAgeMs ? this.latest : null
  }

  private now() {
    return (this.options.clock ?? Date.now)()
  }

  private handleMessage(topic: string, payload: string) {
    const message = parseTasmotaMessage(this.options.deviceTopic, topic, payload, this.now())
    if (message?.type === 'sensor') {
      this.latest = message.reading
    }
  }
}
