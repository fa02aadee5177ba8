import { EventEmitter } from "eventemitter3";
import { filter, map, Observable } from "rxjs";
import type {
  EventPublisher,
  TaskEvent,
  TaskEventStream,
  TaskEventType,
} from "../types/index.js";

type EventOfType<T extends TaskEventType> = Extract<TaskEvent, { type: T }>;

export class EventBus implements EventPublisher, TaskEventStream {
  // 底层 EventEmitter 负责把事件按推送方式广播给订阅者。
  private emitter = new EventEmitter();

  /**
   * 将事件立即广播给所有活跃的订阅者。观察者抛出的异常只记录，不回传给发布方。
   */
  public publish(event: TaskEvent): void {
    try {
      this.emitter.emit("event", event);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[EventBus] Observer failed while handling ${event.type} (${message})`);
    }
  }

  public listenerCount(): number {
    return this.emitter.listenerCount("event");
  }

  /**
   * 暴露一个冷 Observable，在订阅时挂接到 EventEmitter，
   * 并在取消订阅时自动移除此监听。
   */
  public events(): Observable<TaskEvent> {
    return new Observable<TaskEvent>((subscriber) => {
      const handler = (event: TaskEvent) => subscriber.next(event);
      this.emitter.on("event", handler);
      return () => {
        this.emitter.off("event", handler);
      };
    });
  }

  /**
   * 便捷方法：只订阅某个特定类型的事件，同时复用同一个 emitter。
   */
  public eventsOfType<T extends TaskEventType>(type: T): Observable<EventOfType<T>> {
    return this.events().pipe(
      filter((evt): evt is EventOfType<T> => evt.type === type)
    );
  }

  /**
   * 使用映射函数把原始事件转换成另一种形式，依然保持实时推送。
   */
  public mapEvents<T>(project: (event: TaskEvent) => T): Observable<T> {
    return this.events().pipe(map(project));
  }
}
