export {
  createDeliverySurface,
  createLoggingChannels,
  type DeliveryChannels,
  type DeliveryRequest,
  type DeliverySurface,
} from './surface.js';
export { DeliveryTrigger, type DeliveryRunner, type DeliveryTriggerOptions } from './trigger.js';
