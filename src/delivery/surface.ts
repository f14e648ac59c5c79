/**
 * Delivery surface
 * Hands a chosen quote to the notification and/or widget channel
 */

import type { Logger } from 'pino';
import { errorMessage } from '../errors/errors.js';
import {
  deliversByNotification,
  deliversByWidget,
  type DeliveryMethod,
  type Quote,
} from '../schedules/types.js';

export interface DeliveryRequest {
  quote: Quote;
  scheduleId: string;
  deliveryMethod: DeliveryMethod;
}

/**
 * Where delivered quotes go. A rejected promise marks the delivery surface as
 * failed for that schedule; the recorded delivery stays.
 */
export interface DeliverySurface {
  deliver(request: DeliveryRequest): Promise<void>;
}

export interface DeliveryChannels {
  /** Post a local notification */
  notify(request: DeliveryRequest): Promise<void>;
  /** Refresh home-screen widgets */
  updateWidgets(request: DeliveryRequest): Promise<void>;
}

/**
 * Surface that routes by delivery method. For 'both', the two channels run
 * side by side and the call rejects if either failed.
 */
export function createDeliverySurface(channels: DeliveryChannels): DeliverySurface {
  return {
    async deliver(request: DeliveryRequest): Promise<void> {
      const pending: Array<Promise<void>> = [];
      if (deliversByNotification(request.deliveryMethod)) {
        pending.push(channels.notify(request));
      }
      if (deliversByWidget(request.deliveryMethod)) {
        pending.push(channels.updateWidgets(request));
      }

      const results = await Promise.allSettled(pending);
      const failures: unknown[] = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      if (failures.length === 1) {
        throw failures[0];
      }
      if (failures.length > 1) {
        throw new AggregateError(failures, failures.map(errorMessage).join('; '));
      }
    },
  };
}

/**
 * Channels that only write the quote to the log. Used by the command line,
 * which has no notification center or widgets to drive.
 */
export function createLoggingChannels(logger: Logger): DeliveryChannels {
  const log = logger.child({ component: 'delivery-surface' });
  return {
    async notify(request) {
      log.info(
        { scheduleId: request.scheduleId, quoteId: request.quote.id, channel: 'notification' },
        `"${request.quote.text}" (${request.quote.author})`
      );
    },
    async updateWidgets(request) {
      log.info(
        { scheduleId: request.scheduleId, quoteId: request.quote.id, channel: 'widget' },
        `"${request.quote.text}" (${request.quote.author})`
      );
    },
  };
}
