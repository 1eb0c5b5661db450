import { memo, type ReactNode } from "react";
import { Box, Text } from "ink";
import { displayWidth, scrollbarThumb, truncateStr } from "@/tui/lib/layout";
import { useTheme } from "./theme";

interface PanelFrameProps {
  title: string;
  width: number;
  height: number;
  focused: boolean;
  // Drawn on the right border when the content overflows
  scroll?: { total: number; position: number };
  children: ReactNode;
}

/**
 * Rounded box with the title in the top border. Borders are drawn by hand
 * so the right edge can carry a scrollbar thumb.
 */
export const PanelFrame = memo(function PanelFrame({
  title,
  width,
  height,
  focused,
  scroll,
  children,
}: PanelFrameProps) {
  const theme = useTheme();
  const color = focused ? theme.accent : theme.border;
  const inner = Math.max(0, width - 2);
  const rows = Math.max(0, height - 2);

  const label = truncateStr(` ${title} `, Math.max(0, inner - 2));
  const top = `╭─${label}${"─".repeat(Math.max(0, inner - 1 - displayWidth(label)))}╮`;
  const thumb = scroll ? scrollbarThumb(scroll.total, scroll.position, rows) : null;

  return (
    <Box flexDirection="column" width={width} height={height}>
      <Text color={color} bold={focused} wrap="truncate-end">
        {top}
      </Text>
      <Box height={rows}>
        <Box flexDirection="column" width={1}>
          {Array.from({ length: rows }, (_, i) => (
            <Text key={i} color={color}>
              │
            </Text>
          ))}
        </Box>
        <Box flexDirection="column" width={inner} height={rows} overflow="hidden">
          {children}
        </Box>
        <Box flexDirection="column" width={1}>
          {Array.from({ length: rows }, (_, i) => {
            const onThumb = thumb !== null && i >= thumb.start && i < thumb.start + thumb.size;
            return (
              <Text key={i} color={onThumb ? theme.accent : color}>
                {onThumb ? "┃" : "│"}
              </Text>
            );
          })}
        </Box>
      </Box>
      <Text color={color} wrap="truncate-end">{`╰${"─".repeat(inner)}╯`}</Text>
    </Box>
  );
});
