import { memo } from "react";
import { Text } from "ink";
import { useReviewSelector, useReviewStore, type Rect } from "@/tui/contexts/review";
import { PanelFrame } from "./panel-frame";
import { useTheme } from "./theme";

export const PrDescription = memo(function PrDescription({ rect }: { rect: Rect }) {
  const store = useReviewStore();
  const theme = useTheme();
  const focused = useReviewSelector((s) => s.focusedPanel === "prDescription");
  const scroll = useReviewSelector((s) => s.prDescScroll);
  const mediaCount = useReviewSelector((s) => s.mediaRefs.length);
  // Re-render when the layout (and so the wrap width) changes
  useReviewSelector((s) => s.panelRects.prDescription?.width);

  const lines = store.getDescriptionLines();
  const rows = Math.max(0, rect.height - 2);
  const visible = lines.slice(scroll, scroll + rows);
  const title = mediaCount > 0 ? `Description (${mediaCount} media, o)` : "Description";

  return (
    <PanelFrame
      title={title}
      width={rect.width}
      height={rect.height}
      focused={focused}
      scroll={{ total: lines.length, position: scroll }}
    >
      {lines.length === 0 ? (
        <Text color={theme.muted}>No description provided.</Text>
      ) : (
        visible.map((line, i) => (
          <Text
            key={scroll + i}
            color={line.color && theme.accent ? line.color : undefined}
            bold={line.bold}
            dimColor={line.dim}
            wrap="truncate-end"
          >
            {line.text || " "}
          </Text>
        ))
      )}
    </PanelFrame>
  );
});
