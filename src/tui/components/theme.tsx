import { createContext, useContext, type ReactNode } from "react";

export type ThemeName = "dark" | "light";

export interface Theme {
  // Focused panel border and titles
  accent: string | undefined;
  border: string | undefined;
  added: string | undefined;
  removed: string | undefined;
  hunk: string | undefined;
  muted: string | undefined;
  cursorBg: string | undefined;
  selectionBg: string | undefined;
  pendingBg: string | undefined;
  error: string | undefined;
  success: string | undefined;
}

const DARK: Theme = {
  accent: "cyan",
  border: "gray",
  added: "green",
  removed: "red",
  hunk: "cyan",
  muted: "gray",
  cursorBg: "#3a3a3a",
  selectionBg: "#264f78",
  pendingBg: "#4b3b12",
  error: "red",
  success: "green",
};

const LIGHT: Theme = {
  accent: "blue",
  border: "gray",
  added: "green",
  removed: "red",
  hunk: "blue",
  muted: "gray",
  cursorBg: "#e4e4e4",
  selectionBg: "#add6ff",
  pendingBg: "#fff3c4",
  error: "red",
  success: "green",
};

const PLAIN: Theme = {
  accent: undefined,
  border: undefined,
  added: undefined,
  removed: undefined,
  hunk: undefined,
  muted: undefined,
  cursorBg: undefined,
  selectionBg: undefined,
  pendingBg: undefined,
  error: undefined,
  success: undefined,
};

export function resolveTheme(name: ThemeName, color: boolean): Theme {
  if (!color) return PLAIN;
  return name === "light" ? LIGHT : DARK;
}

const ThemeContext = createContext<Theme>(DARK);

export function ThemeProvider({
  theme,
  children,
}: {
  theme: Theme;
  children: ReactNode;
}) {
  return <ThemeContext.Provider value={theme}>{children}</ThemeContext.Provider>;
}

export function useTheme(): Theme {
  return useContext(ThemeContext);
}
