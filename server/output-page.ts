/**
 * Per-request output state the hooks can observe and extend: client module
 * registrations and whether this is a printable rendering.
 */
export class OutputPage {
  private modules = new Set<string>();
  private moduleStyles = new Set<string>();
  private printable: boolean;

  constructor(options: { printable?: boolean } = {}) {
    this.printable = options.printable ?? false;
  }

  isPrintable(): boolean {
    return this.printable;
  }

  addModules(...names: string[]): void {
    for (const name of names) this.modules.add(name);
  }

  addModuleStyles(...names: string[]): void {
    for (const name of names) this.moduleStyles.add(name);
  }

  getModules(): string[] {
    return Array.from(this.modules);
  }

  getModuleStyles(): string[] {
    return Array.from(this.moduleStyles);
  }
}
