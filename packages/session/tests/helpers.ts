// ============================================================================
// Session test fixtures
// ============================================================================

import type { Intent, NewTurn, ResponseMetadata, Subject } from '@stem-tutor/shared';

let counter = 0;

export interface TurnFixture {
  text?: string;
  intent?: Intent;
  subject?: Subject;
  topic?: string;
  response?: string;
  metadata?: Partial<ResponseMetadata>;
  quizOutcome?: number;
  messageId?: string;
}

export function makeTurn(studentId: string, fixture: TurnFixture = {}): NewTurn {
  counter++;
  return {
    message: {
      id: fixture.messageId ?? `msg-${counter}`,
      studentId,
      text: fixture.text ?? `message ${counter}`,
      timestamp: new Date('2024-01-15T09:59:00.000Z'),
    },
    intent: fixture.intent ?? 'GeneralChat',
    subject: fixture.subject ?? 'Unclassified',
    topic: fixture.topic,
    response: {
      text: fixture.response ?? `reply ${counter}`,
      metadata: { providers: ['concept-explainer'], degraded: false, ...fixture.metadata },
    },
    quizOutcome: fixture.quizOutcome,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
