import type { SimEvent } from '../types/simulation';

// Event log of one simulation run. Each network owns its own collector.
export class EventCollector {
  private events: SimEvent[] = [];

  private currentSimTime = 0;

  private sequence = 0;

  setCurrentSimTime(simTime: number): void {
    this.currentSimTime = simTime;
  }

  recordEvent(event: Omit<SimEvent, 'id' | 'timestamp'>): SimEvent {
    this.sequence += 1;
    const enriched: SimEvent = {
      ...event,
      id: `evt-${this.sequence}`,
      timestamp: this.currentSimTime,
    };
    this.events.push(enriched);
    return enriched;
  }

  getEvents(): readonly SimEvent[] {
    return this.events;
  }

  getEventsOfType(type: SimEvent['type']): SimEvent[] {
    return this.events.filter((event) => event.type === type);
  }

  clear(): void {
    this.events = [];
    this.currentSimTime = 0;
    this.sequence = 0;
  }
}
