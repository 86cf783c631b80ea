// src/core/flow/flow.ts
// Cold flows: each iteration launches a fresh producer task that hands
// values to the consumer through a rendezvous channel.

import { Obj } from "../obj/obj";
import { ObjClass } from "../obj/class";
import { ObjBool, ObjVoid } from "../obj/primitives";
import { ObjIterator, iterableType, iteratorType } from "../iter/iterator";
import { ClosureScope, type Scope } from "../scope/scope";
import { statement, type Statement } from "../scope/statement";
import { Mutex } from "../concurrency/mutex";
import { ChannelClosedError, RendezvousChannel, type ReceiveResult } from "../concurrency/channel";
import { launch, type Task } from "../concurrency/launch";
import { FlowNoLongerCollected } from "../errors/signals";
import { ExecutionError } from "../errors/scriptError";
import type { RuntimeServices } from "../runtime/services";

let nextFlowId = 1;

/**
 * Reset flow ids (for testing).
 */
export function resetFlowIds(): void {
  nextFlowId = 1;
}

// ─────────────────────────────────────────────────────────────────
// Producer side
// ─────────────────────────────────────────────────────────────────

/**
 * Receiver of a producer body. `emit` waits until the consumer takes the
 * value.
 */
export class ObjFlowBuilder extends Obj {
  constructor(readonly output: RendezvousChannel<Obj>) {
    super();
  }

  get objClass(): ObjClass {
    return ObjFlowBuilder.type;
  }

  /**
   * @throws FlowNoLongerCollected once the consumer cancelled or the
   *   channel is closed
   */
  async emit(value: Obj): Promise<void> {
    if (this.output.isClosedForSend) throw new FlowNoLongerCollected();
    try {
      await this.output.send(value);
    } catch (e) {
      if (e instanceof ChannelClosedError) throw new FlowNoLongerCollected();
      throw e;
    }
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    if (!ObjFlowBuilder._type) {
      const type = new ObjClass("FlowBuilder");
      type.addFn("emit", async (s) => {
        await s.thisAs(ObjFlowBuilder).emit(s.requireOnlyArg());
        return ObjVoid;
      });
      ObjFlowBuilder._type = type;
    }
    return ObjFlowBuilder._type;
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof ExecutionError) return error.errorMessage;
  return error instanceof Error ? error.message : String(error);
}

/**
 * Open a channel and launch `producer` with a builder as its receiver.
 * The producer's end, normal or not, closes the channel; failures stop
 * at this boundary and never reach the consumer.
 */
function createFlowInput(
  scope: Scope,
  producer: Statement,
  flowId: number
): { channel: RendezvousChannel<Obj>; task: Task } {
  const channel = new RendezvousChannel<Obj>();
  const builderScope = scope.createChildScope({ thisObj: new ObjFlowBuilder(channel) });
  const { logger, onEvent, config } = scope.services;

  const task = launch(`flow-${flowId}`, async () => {
    try {
      await producer.execute(builderScope);
      onEvent?.({ tag: "flowCompleted", flowId, timestamp: Date.now() });
    } catch (e) {
      if (e instanceof FlowNoLongerCollected) {
        logger.debug(`flow ${flowId}: consumer stopped collecting`);
      } else {
        const message = describeFailure(e);
        onEvent?.({ tag: "producerFailed", flowId, message, timestamp: Date.now() });
        if (config.flow.producerErrorPolicy === "log") {
          logger.warn(`flow ${flowId}: producer failed`, { message });
        }
      }
    } finally {
      channel.close();
    }
  });

  return { channel, task };
}

// ─────────────────────────────────────────────────────────────────
// Flow
// ─────────────────────────────────────────────────────────────────

class FlowClass extends ObjClass {
  async callOn(scope: Scope): Promise<Obj> {
    return scope.raiseError("Flow constructor is not available");
  }
}

/**
 * A producer body plus the environment it was defined in. Inert until
 * iterated; every iterator runs the producer again.
 */
export class ObjFlow extends Obj {
  constructor(
    readonly producer: Statement,
    readonly scope: Scope
  ) {
    super();
  }

  get objClass(): ObjClass {
    return ObjFlow.type;
  }

  iterator(): ObjFlowIterator {
    return new ObjFlowIterator(
      statement((s) => this.producer.execute(new ClosureScope(s, this.scope)), this.producer.pos)
    );
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    if (!ObjFlow._type) {
      const type = new FlowClass("Flow", [iterableType()]);
      type.addFn("iterator", async (s) => s.thisAs(ObjFlow).iterator());
      ObjFlow._type = type;
    }
    return ObjFlow._type;
  }
}

// ─────────────────────────────────────────────────────────────────
// Consumer side
// ─────────────────────────────────────────────────────────────────

export class ObjFlowIterator extends ObjIterator {
  private channel: RendezvousChannel<Obj> | null = null;
  private nextItem: ReceiveResult<Obj> | null = null;
  private cancelled = false;
  private readonly access = new Mutex("flow-iterator");
  private services: RuntimeServices | null = null;
  /** Set on cold start. */
  flowId: number | null = null;
  /** The running producer, once started. */
  producerTask: Task | null = null;

  constructor(readonly producer: Statement) {
    super();
  }

  get objClass(): ObjClass {
    return ObjFlowIterator.type;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  private checkNotCancelled(scope: Scope): void {
    if (this.cancelled) scope.raiseIllegalState("iteration is cancelled");
  }

  async hasNext(scope: Scope): Promise<boolean> {
    this.checkNotCancelled(scope);
    if (!this.channel) {
      const flowId = nextFlowId++;
      this.flowId = flowId;
      this.services = scope.services;
      scope.services.onEvent?.({ tag: "flowStarted", flowId, timestamp: Date.now() });
      const input = createFlowInput(scope, this.producer, flowId);
      this.channel = input.channel;
      this.producerTask = input.task;
    }
    const item = this.nextItem ?? (await this.channel.receiveCatching());
    this.nextItem = item;
    return item.tag === "value";
  }

  async next(scope: Scope): Promise<Obj> {
    this.checkNotCancelled(scope);
    await this.hasNext(scope);
    const item = this.nextItem;
    if (!item || item.tag !== "value") return scope.raiseIllegalState("iteration is done");
    this.nextItem = null;
    return item.value;
  }

  /** Idempotent. A producer blocked in `emit` wakes up and stops. */
  async cancel(): Promise<void> {
    await this.access.withLock(() => {
      if (this.cancelled) return;
      this.cancelled = true;
      this.nextItem = null;
      if (this.channel) {
        this.channel.cancel();
        const flowId = this.flowId ?? 0;
        this.services?.onEvent?.({ tag: "flowCancelled", flowId, timestamp: Date.now() });
      }
    });
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    if (!ObjFlowIterator._type) {
      const type = new ObjClass("FlowIterator", [iteratorType()]);
      type.addFn("hasNext", async (s) => ObjBool.of(await s.thisAs(ObjFlowIterator).hasNext(s)));
      type.addFn("next", async (s) => s.thisAs(ObjFlowIterator).next(s));
      type.addFn("cancelIteration", async (s) => {
        await s.thisAs(ObjFlowIterator).cancel();
        return ObjVoid;
      });
      ObjFlowIterator._type = type;
    }
    return ObjFlowIterator._type;
  }
}
