import type {
  ConfirmationPrompter,
  DestructiveActionRequest,
} from "../../agent/src/security/security-gate.js";

export class FakePrompter implements ConfirmationPrompter {
  readonly requests: DestructiveActionRequest[] = [];

  constructor(private readonly answer: boolean | Error = true) {}

  async confirm(request: DestructiveActionRequest): Promise<boolean> {
    this.requests.push(request);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}
