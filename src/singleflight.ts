import { GatewayError } from "./errors.js";
import { logger } from "./utils.js";

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

function cancelled(): GatewayError {
  return new GatewayError("Cancelled", "Invocation was abandoned by the caller");
}

/**
 * Collapses concurrent calls with the same key into one execution.
 *
 * The shared work runs under its own AbortController rather than the first
 * caller's signal. A caller that abandons only detaches itself; the work is
 * aborted when the last waiter leaves. Whoever is still waiting keeps the
 * flight alive, so the first caller leaving never drops the call.
 */
export class SingleFlight<T> {
  private readonly flights = new Map<string, Flight<T>>();

  get inFlight(): number {
    return this.flights.size;
  }

  run(key: string, work: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(cancelled());
    }

    let flight = this.flights.get(key);
    if (flight) {
      logger.debug("[singleflight] joining in-flight request");
    } else {
      flight = this.start(key, work);
    }
    flight.waiters++;
    return this.wait(key, flight, signal);
  }

  private start(key: string, work: (signal: AbortSignal) => Promise<T>): Flight<T> {
    const controller = new AbortController();
    const flight: Flight<T> = {
      promise: Promise.resolve().then(() => work(controller.signal)),
      controller,
      waiters: 0,
    };
    this.flights.set(key, flight);

    flight.promise.then(
      () => this.release(key, flight),
      (error: unknown) => {
        this.release(key, flight);
        logger.debug("[singleflight] shared request failed:", error instanceof Error ? error.message : error);
      },
    );
    return flight;
  }

  private wait(key: string, flight: Flight<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const onAbort = () => {
        if (settled) return;
        settled = true;
        flight.waiters--;
        if (flight.waiters === 0) {
          logger.debug("[singleflight] last waiter left, aborting shared request");
          this.release(key, flight);
          flight.controller.abort(cancelled());
        }
        reject(cancelled());
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      flight.promise.then(
        (value) => {
          signal?.removeEventListener("abort", onAbort);
          if (settled) return;
          settled = true;
          resolve(value);
        },
        (error: unknown) => {
          signal?.removeEventListener("abort", onAbort);
          if (settled) return;
          settled = true;
          reject(error);
        },
      );
    });
  }

  private release(key: string, flight: Flight<T>): void {
    if (this.flights.get(key) === flight) {
      this.flights.delete(key);
    }
  }
}
