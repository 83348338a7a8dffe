export interface SecurityVerdict {
  passed: boolean;
  /** Sanitized text to continue with when the screen passes. */
  text: string;
  reason?: string;
}

export interface SecurityScreen {
  screenInput(text: string): Promise<SecurityVerdict>;
  screenOutput(text: string): Promise<SecurityVerdict>;
}

export class PassThroughScreen implements SecurityScreen {
  async screenInput(text: string): Promise<SecurityVerdict> {
    return { passed: true, text: text.trim() };
  }

  async screenOutput(text: string): Promise<SecurityVerdict> {
    return { passed: true, text };
  }
}
