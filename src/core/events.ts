import { EventEmitter } from 'eventemitter3';

export interface LambdaEvents {
  'grounding:completed': { hash: string; certainty: number; fallback: boolean };
  'reasoning:completed': { hash: string; cached: boolean };
  'reflection:completed': { cycleId: string; emergence: number; lambdaTotal: number; breakthrough: boolean };
  'improvement:applied': { cycleId: string; kind: string; summary: string };
  'convergence:detected': { avgChange: number; stdChange: number; confidence: number };
  'path:stored': { id: string; sessionId: string; safe: boolean };
}

export type LambdaEventName = keyof LambdaEvents;

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends LambdaEventName>(event: K, listener: (data: LambdaEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends LambdaEventName>(event: K, listener: (data: LambdaEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends LambdaEventName>(event: K, listener: (data: LambdaEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends LambdaEventName>(event: K, data: LambdaEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
