import chalk, { type ChalkInstance } from "chalk";
import { fieldBoolean, fieldNumber, fieldString, LiveCommand, type LiveEvent } from "../live/events.js";

const ANONYMOUS = "anonymous";
const BEIJING_OFFSET_MS = 8 * 3600 * 1000;

export function guardLevelLabel(level: number): string {
  switch (level) {
    case 1:
      return "Governor";
    case 2:
      return "Admiral";
    case 3:
      return "Captain";
    default:
      return `level ${level}`;
  }
}

/** Upstream amounts are in thousandths of a yuan. */
export function formatCurrency(amount: number): string {
  return `${(amount / 1000).toFixed(2)} CNY`;
}

/** Unix seconds rendered in UTC+8, the platform's local time. */
export function formatTimestamp(seconds: number | undefined): string {
  if (seconds === undefined) return "--:--:--";
  const date = new Date(seconds * 1000 + BEIJING_OFFSET_MS);
  if (Number.isNaN(date.getTime())) return "--:--:--";
  return date.toISOString().slice(0, 19).replace("T", " ");
}

function formatMedal(name: string | undefined, level: number | undefined): string | undefined {
  const trimmed = name?.trim();
  if (!trimmed) return undefined;
  return level !== undefined && level > 0 ? `medal: ${trimmed} Lv${level}` : `medal: ${trimmed}`;
}

class Details {
  private readonly parts: string[] = [];

  add(label: string, value: string | number | undefined): this {
    if (value === undefined) return this;
    const text = String(value);
    if (text.trim() !== "") this.parts.push(`${label}: ${text}`);
    return this;
  }

  push(part: string | undefined): this {
    if (part) this.parts.push(part);
    return this;
  }

  guard(level: number | undefined): this {
    if (level !== undefined && level > 0) this.parts.push(`guard: ${guardLevelLabel(level)}`);
    return this;
  }

  lines(palette: ChalkInstance): string[] {
    return this.parts.length > 0 ? [palette.dim(`    ${this.parts.join(" · ")}`)] : [];
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== "" ? value : undefined;
}

function yesNo(value: boolean | undefined): string | undefined {
  return value === undefined ? undefined : value ? "yes" : "no";
}

/**
 * Formats a live event as console lines: a headline plus an optional details
 * line. Returns null for commands without a renderer.
 */
export function renderEvent(event: LiveEvent, palette: ChalkInstance = chalk): string[] | null {
  const ts = formatTimestamp(fieldNumber(event, "timestamp"));
  const uname = nonEmpty(fieldString(event, "uname")) ?? ANONYMOUS;
  const roomId = fieldNumber(event, "room_id");
  const openId = fieldString(event, "open_id");
  const medal = formatMedal(fieldString(event, "fans_medal_name"), fieldNumber(event, "fans_medal_level"));

  switch (event.cmd) {
    case LiveCommand.DANMAKU: {
      const name = fieldBoolean(event, "is_admin") ? `[admin] ${uname}` : uname;
      const message = fieldString(event, "msg") ?? "<empty>";
      const details = new Details()
        .add("open_id", openId)
        .add("room_id", roomId)
        .guard(fieldNumber(event, "guard_level"))
        .push(medal)
        .add("wearing medal", yesNo(fieldBoolean(event, "fans_medal_wearing_status")))
        .add("reply to", nonEmpty(fieldString(event, "reply_uname")));
      if (fieldNumber(event, "dm_type") === 1) {
        const emoji = nonEmpty(fieldString(event, "emoji_img_url"));
        details.push(emoji ? `emoji: ${emoji}` : "emoji message");
      }
      details.add("msg_id", fieldString(event, "msg_id"));
      return [`${palette.cyan(`💬 [${ts}]`)} ${palette.bold(name)}: ${message}`, ...details.lines(palette)];
    }
    case LiveCommand.GIFT: {
      const gift = nonEmpty(fieldString(event, "gift_name")) ?? "gift";
      const count = Math.max(1, fieldNumber(event, "gift_num") ?? 1);
      const reported = fieldNumber(event, "r_price");
      const total = reported !== undefined && reported > 0 ? reported : (fieldNumber(event, "price") ?? 0) * count;
      const details = new Details();
      if (total > 0) details.push(`value ${formatCurrency(total)}`);
      if (fieldBoolean(event, "paid")) details.push("paid gift");
      if (fieldBoolean(event, "combo_gift")) {
        const combo = fieldNumber(event, "combo_info", "combo_count");
        const base = fieldNumber(event, "combo_info", "combo_base_num");
        if (combo !== undefined) details.push(`combo x${combo}`);
        if (base !== undefined) details.push(`${base} per combo`);
      }
      details
        .push(medal)
        .guard(fieldNumber(event, "guard_level"))
        .add("open_id", openId)
        .add("room_id", roomId)
        .add("msg_id", fieldString(event, "msg_id"))
        .add("icon", nonEmpty(fieldString(event, "gift_icon")));
      return [
        `${palette.magenta(`🎁 [${ts}]`)} ${palette.bold(uname)} sent ${gift} x${count}`,
        ...details.lines(palette),
      ];
    }
    case LiveCommand.SUPER_CHAT: {
      const amount = fieldNumber(event, "rmb") ?? 0;
      const message = fieldString(event, "message") ?? "<empty>";
      const start = fieldNumber(event, "start_time");
      const end = fieldNumber(event, "end_time");
      const details = new Details()
        .add("open_id", openId)
        .add("message_id", fieldNumber(event, "message_id"))
        .add("msg_id", fieldString(event, "msg_id"))
        .add("room_id", roomId)
        .push(medal)
        .guard(fieldNumber(event, "guard_level"));
      if (start !== undefined && end !== undefined) {
        details.push(`shown ${formatTimestamp(start)} - ${formatTimestamp(end)}`);
      }
      return [
        `${palette.yellow(`💠 [${ts}]`)} ${palette.bold(uname)} super chat ¥${amount}: ${message}`,
        ...details.lines(palette),
      ];
    }
    case LiveCommand.SUPER_CHAT_DELETE: {
      const raw = event.data !== null && typeof event.data === "object" ? Reflect.get(event.data, "message_ids") : undefined;
      const ids = Array.isArray(raw) ? raw.filter((id): id is number => typeof id === "number") : [];
      const details = new Details().add("room_id", roomId).add("msg_id", fieldString(event, "msg_id"));
      return [
        `${palette.red(`🚫 [${ts}]`)} super chat removed: ${ids.length > 0 ? ids.join(", ") : "-"}`,
        ...details.lines(palette),
      ];
    }
    case LiveCommand.GUARD: {
      const buyer = nonEmpty(fieldString(event, "user_info", "uname")) ?? ANONYMOUS;
      const level = fieldNumber(event, "guard_level") ?? 0;
      const num = fieldNumber(event, "guard_num") ?? 1;
      const unit = nonEmpty(fieldString(event, "guard_unit")) ?? "month";
      const price = fieldNumber(event, "price") ?? 0;
      const details = new Details();
      if (price > 0) details.push(`value ${formatCurrency(price)}`);
      details
        .add("room_id", roomId)
        .add("open_id", fieldString(event, "user_info", "open_id"))
        .push(medal)
        .add("wearing medal", yesNo(fieldBoolean(event, "fans_medal_wearing_status")));
      return [
        `${palette.blue(`🛡️ [${ts}]`)} ${palette.bold(buyer)} bought ${guardLevelLabel(level)} x${num} (${unit})`,
        ...details.lines(palette),
      ];
    }
    case LiveCommand.LIKE: {
      const likes = fieldNumber(event, "like_count") ?? 0;
      const details = new Details()
        .add("text", nonEmpty(fieldString(event, "like_text")))
        .add("room_id", roomId)
        .add("open_id", openId);
      return [`${palette.green(`👍 [${ts}]`)} ${palette.bold(uname)} liked ${likes} times`, ...details.lines(palette)];
    }
    case LiveCommand.ROOM_ENTER: {
      const details = new Details().add("room_id", roomId).add("open_id", openId);
      return [`${palette.gray(`🚪 [${ts}]`)} ${palette.bold(uname)} entered the room`, ...details.lines(palette)];
    }
    case LiveCommand.LIVE_START:
    case LiveCommand.LIVE_END: {
      const starting = event.cmd === LiveCommand.LIVE_START;
      const fallback = starting ? "live started" : "live ended";
      const title = nonEmpty(fieldString(event, "title")) ?? fallback;
      const details = new Details()
        .add("area", fieldString(event, "area_name"))
        .add("room_id", roomId)
        .add("open_id", openId);
      const icon = starting ? "🚀" : "🏁";
      return [`${palette.green(`${icon} [${ts}]`)} ${fallback}: ${title}`, ...details.lines(palette)];
    }
    case LiveCommand.INTERACTION_END:
      return [`${palette.red(`⛔ [${ts}]`)} push ended, game_id: ${fieldString(event, "game_id") ?? "-"}`];
    default:
      return null;
  }
}
