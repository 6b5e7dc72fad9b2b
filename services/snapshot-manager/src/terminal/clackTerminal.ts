import * as prompts from "@clack/prompts";
import type { MenuOption, Terminal } from "../types/interfaces.js";

export class ClackTerminal implements Terminal {
  heading(title: string): void {
    prompts.intro(title);
  }

  print(text: string): void {
    prompts.log.message(text);
  }

  info(message: string): void {
    prompts.log.info(message);
  }

  success(message: string): void {
    prompts.log.success(message);
  }

  warn(message: string): void {
    prompts.log.warn(message);
  }

  error(message: string): void {
    prompts.log.error(message);
  }

  async choose(message: string, options: MenuOption[]): Promise<string | null> {
    const allowed = new Set(options.map((option) => option.value));
    prompts.note(options.map((option) => `${option.value}. ${option.label}`).join("\n"));
    const value = await prompts.text({
      message,
      validate: (input) => (allowed.has(input.trim().toLowerCase()) ? undefined : "Invalid choice. Please try again.")
    });
    if (prompts.isCancel(value)) {
      return null;
    }
    return value.trim().toLowerCase();
  }

  async secret(message: string): Promise<string | null> {
    const value = await prompts.password({ message, mask: "*" });
    return prompts.isCancel(value) ? null : value;
  }

  async confirm(message: string): Promise<boolean | null> {
    const value = await prompts.confirm({ message, initialValue: false });
    return prompts.isCancel(value) ? null : value;
  }

  async pause(message: string): Promise<boolean> {
    const value = await prompts.text({ message, defaultValue: "" });
    return !prompts.isCancel(value);
  }

  onInterrupt(handler: () => void): () => void {
    process.on("SIGINT", handler);
    return () => {
      process.off("SIGINT", handler);
    };
  }
}
