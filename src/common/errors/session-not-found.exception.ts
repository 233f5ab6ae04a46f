import { NotFoundException } from '@nestjs/common';

export class SessionNotFoundException extends NotFoundException {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
  }
}
