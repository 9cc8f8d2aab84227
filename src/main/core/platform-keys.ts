export type HostPlatform = NodeJS.Platform;

type KeyTable = Record<string, readonly string[]>;

const mod = (platform: HostPlatform): string => (platform === "darwin" ? "command" : "ctrl");

const lookup = (table: KeyTable, operation: string): string[] | null => {
  const keys = table[operation];
  return keys ? [...keys] : null;
};

export const clipboardKeys = (operation: string, platform: HostPlatform): string[] | null =>
  lookup(
    {
      copy: [mod(platform), "c"],
      paste: [mod(platform), "v"],
      cut: [mod(platform), "x"],
      select_all: [mod(platform), "a"],
      undo: [mod(platform), "z"],
      redo: platform === "darwin" ? ["command", "shift", "z"] : ["ctrl", "y"]
    },
    operation
  );

export const tabKeys = (operation: string, platform: HostPlatform): string[] | null =>
  lookup(
    {
      new: [mod(platform), "t"],
      close: [mod(platform), "w"],
      reopen: [mod(platform), "shift", "t"],
      next: platform === "darwin" ? ["command", "option", "right"] : ["ctrl", "tab"],
      previous: platform === "darwin" ? ["command", "option", "left"] : ["ctrl", "shift", "tab"]
    },
    operation
  );

export const windowKeys = (operation: string, platform: HostPlatform): string[] | null =>
  lookup(
    platform === "darwin"
      ? { switch: ["command", "`"], minimize: ["command", "m"], close: ["command", "w"] }
      : { switch: ["alt", "tab"], minimize: ["win", "down"], close: ["alt", "f4"] },
    operation
  );

export const composeEmailKeys = (platform: HostPlatform): string[] => [mod(platform), "n"];

export const replyEmailKeys = (platform: HostPlatform): string[] => [mod(platform), "r"];

export const sendEmailKeys = (platform: HostPlatform): string[] =>
  platform === "darwin" ? ["command", "shift", "d"] : ["ctrl", "enter"];

export const sendMessageKeys = (_platform: HostPlatform): string[] => ["enter"];

export const defaultMailApp = (platform: HostPlatform): string => {
  if (platform === "darwin") {
    return "Mail";
  }
  return platform === "win32" ? "Outlook" : "Thunderbird";
};

/** Only macOS can send a text through the Messages scripting bridge. */
export const supportsNativeMessaging = (platform: HostPlatform): boolean => platform === "darwin";

export const joinKeys = (keys: readonly string[]): string => keys.join("+");

export const splitKeys = (keys: string): string[] =>
  keys
    .split("+")
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
