import { TemplateError } from "./errors.js";

export interface RendererOptions {
  format: string;
  formats?: Partial<Record<StatusString, string>>;
  playerIcons?: IconTable;
  statusIcons?: IconTable;
}

type Placeholder =
  | "player"
  | "status"
  | "artist"
  | "title"
  | "album"
  | "length"
  | "player_icon"
  | "status_icon"
  | "dynamic";

const PLACEHOLDERS: ReadonlySet<string> = new Set<Placeholder>([
  "player",
  "status",
  "artist",
  "title",
  "album",
  "length",
  "player_icon",
  "status_icon",
  "dynamic",
]);

const ESCAPED: ReadonlySet<Placeholder> = new Set<Placeholder>([
  "artist",
  "album",
  "title",
  "dynamic",
]);

// [[fill]align][width][.precision]
const FORMAT_SPEC = /^(?:(.)?([<>^]))?(\d+)?(?:\.(\d+))?$/u;

const MARKUP_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "'": "&#39;",
  '"': "&quot;",
};

export class TemplateRenderer {
  constructor(private readonly options: RendererOptions) {}

  /** Per-status template when set and non-empty, else the default one. */
  selectTemplate(status: StatusString): string {
    return this.options.formats?.[status] || this.options.format;
  }

  /**
   * Renders the snapshot into markup.
   * @throws TemplateError when the template references a field the snapshot lacks
   */
  render(info: PlayerInfo): string {
    const values: Record<Placeholder, string | undefined> = {
      player: info.name,
      status: info.statusString,
      artist: info.artist,
      album: info.album,
      title: info.title,
      length: info.length,
      player_icon: getIcon(this.options.playerIcons, info.name),
      status_icon: getIcon(this.options.statusIcons, info.statusString),
      dynamic: buildDynamic(info),
    };

    return substitute(this.selectTemplate(info.statusString), (key, spec) => {
      if (!isPlaceholder(key)) {
        throw new TemplateError(`unknown placeholder {${key}}`, key);
      }
      const value = values[key];
      if (value === undefined) {
        throw new TemplateError(`{${key}} is not available for player ${info.name}`, key);
      }
      // spec applies to the raw text, escaping comes after
      const text = applyFormatSpec(value, spec);
      return ESCAPED.has(key) ? escapeMarkup(text) : text;
    });
  }
}

/**
 * `artist - album - title [length]`, leaving out whatever is missing.
 */
export function buildDynamic(fields: {
  artist?: string;
  album?: string;
  title?: string;
  length?: string;
}): string {
  const text = [fields.artist, fields.album, fields.title]
    .filter((part): part is string => part !== undefined)
    .join(" - ");
  if (fields.length === undefined) return text;
  return text ? `${text} [${fields.length}]` : `[${fields.length}]`;
}

export function getIcon(icons: IconTable | undefined, key: string): string {
  if (!icons) return "";
  if (Object.hasOwn(icons, key)) return icons[key] ?? "";
  if (Object.hasOwn(icons, "default")) return icons["default"] ?? "";
  return "";
}

export function escapeMarkup(text: string): string {
  return text.replace(/[&<>'"]/g, (ch) => MARKUP_ESCAPES[ch] ?? ch);
}

/**
 * Pads and truncates by a format spec such as `.20`, `>8` or `*^12`.
 * Strings align left unless the spec says otherwise.
 */
export function applyFormatSpec(value: string, spec: string | undefined): string {
  if (!spec) return value;
  const match = FORMAT_SPEC.exec(spec);
  if (!match) throw new TemplateError(`invalid format spec "${spec}"`);
  const [, fill = " ", align = "<", width, precision] = match;

  let chars = Array.from(value);
  if (precision !== undefined) chars = chars.slice(0, Number(precision));
  const text = chars.join("");
  const padding = width === undefined ? 0 : Math.max(0, Number(width) - chars.length);

  switch (align) {
    case ">":
      return fill.repeat(padding) + text;
    case "^": {
      const left = Math.floor(padding / 2);
      return fill.repeat(left) + text + fill.repeat(padding - left);
    }
    default:
      return text + fill.repeat(padding);
  }
}

/**
 * Replaces `{name}` and `{name:spec}` placeholders; `{{` and `}}` stand for
 * literal braces.
 */
export function substitute(
  template: string,
  lookup: (name: string, spec: string | undefined) => string
): string {
  let out = "";
  let i = 0;
  while (i < template.length) {
    const ch = template[i];
    if (ch === "{") {
      if (template[i + 1] === "{") {
        out += "{";
        i += 2;
        continue;
      }
      const end = template.indexOf("}", i + 1);
      if (end === -1) throw new TemplateError(`unterminated placeholder at offset ${i}`);
      const field = template.slice(i + 1, end);
      const colon = field.indexOf(":");
      out +=
        colon === -1
          ? lookup(field, undefined)
          : lookup(field.slice(0, colon), field.slice(colon + 1));
      i = end + 1;
    } else if (ch === "}") {
      if (template[i + 1] !== "}") throw new TemplateError(`unmatched '}' at offset ${i}`);
      out += "}";
      i += 2;
    } else {
      out += ch;
      i += 1;
    }
  }
  return out;
}

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDERS.has(name);
}
