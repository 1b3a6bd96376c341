/**
 * Logging Component Names
 *
 * Standardized component names for structured logging.
 *
 * Usage:
 *   logger.info('Provider registered', { component: LogComponents.BRIDGE });
 */

export const LogComponents = {
  BRIDGE: 'Bridge',
  INITIALIZER: 'DatapointInitializer',
  MQTT: 'MqttBus',
} as const;
