// Subscriber side of the completion bus. The scheduler owns the fan-out list
// and calls each listener in order when a physical register becomes ready.
export interface ReadinessListener {
  onRegisterReady(regNum: number): void;
}

export function publishReady(listeners: readonly ReadinessListener[], regNum: number): void {
  for (const l of listeners) l.onRegisterReady(regNum);
}
