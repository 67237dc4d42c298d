import type { ComponentType } from "react";
import { Callout } from "@radix-ui/themes";
import {
  CheckCircledIcon,
  CrossCircledIcon,
  ExclamationTriangleIcon,
  InfoCircledIcon,
} from "@radix-ui/react-icons";

export type NoticeTone = "success" | "info" | "warning" | "error";

export interface NoticeMessage {
  tone: NoticeTone;
  message: string;
}

const TONE_COLORS = {
  success: "green",
  info: "blue",
  warning: "amber",
  error: "red",
} as const satisfies Record<NoticeTone, string>;

const TONE_ICONS: Record<NoticeTone, ComponentType> = {
  success: CheckCircledIcon,
  info: InfoCircledIcon,
  warning: ExclamationTriangleIcon,
  error: CrossCircledIcon,
};

export function Notice({ tone, message }: NoticeMessage): JSX.Element {
  const Icon = TONE_ICONS[tone];
  return (
    <Callout.Root
      size="1"
      color={TONE_COLORS[tone]}
      role={tone === "error" ? "alert" : "status"}
    >
      <Callout.Icon>
        <Icon />
      </Callout.Icon>
      <Callout.Text>{message}</Callout.Text>
    </Callout.Root>
  );
}

export function NoticeList({ notices }: { notices: readonly NoticeMessage[] }): JSX.Element | null {
  if (notices.length === 0) {
    return null;
  }
  return (
    <>
      {notices.map((notice, index) => (
        <Notice key={`${notice.tone}-${index}`} tone={notice.tone} message={notice.message} />
      ))}
    </>
  );
}
