/**
 * Tag values shared by every track function. The generated script keeps
 * them in shell variables that the operator edits or overrides per call;
 * the generator only writes their defaults.
 */
export interface TagDefaults {
  genre: string;
  artist: string;
  album: string;
  year: string;
  comment: string;
  image: string;
}

export type SharedTag = keyof TagDefaults;

export const SHARED_TAGS: readonly SharedTag[] = [
  "genre",
  "artist",
  "album",
  "year",
  "comment",
  "image",
];

export const EMPTY_TAGS: Readonly<TagDefaults> = Object.freeze({
  genre: "",
  artist: "",
  album: "",
  year: "",
  comment: "",
  image: "",
});

export const TAG_VARIABLES: Record<SharedTag, string> = {
  genre: "GENRE",
  artist: "ARTIST",
  album: "ALBUM",
  year: "YEAR",
  comment: "COMMENT",
  image: "IMAGE",
};

export type TrackField = "source" | "track" | "title";

export interface Accessor {
  readonly flag: string;
  readonly field: SharedTag | TrackField;
}

/** Accessor flags in the order a track function's `case` lists them. */
export const ACCESSORS: readonly Accessor[] = [
  { flag: "-f", field: "source" },
  { flag: "-g", field: "genre" },
  { flag: "-a", field: "artist" },
  { flag: "-b", field: "album" },
  { flag: "-y", field: "year" },
  { flag: "-n", field: "track" },
  { flag: "-t", field: "title" },
  { flag: "-c", field: "comment" },
  { flag: "-i", field: "image" },
];

/** Positional field order of the runtime `encode` helper, before the output path. */
export const ENCODE_FIELDS: ReadonlyArray<SharedTag | Exclude<TrackField, "source">> = [
  "genre",
  "artist",
  "album",
  "year",
  "track",
  "title",
  "comment",
  "image",
];

export function accessorFlag(field: SharedTag | TrackField): string {
  const accessor = ACCESSORS.find((candidate) => candidate.field === field);
  if (!accessor) {
    throw new Error(`No accessor for field ${field}`);
  }
  return accessor.flag;
}

export function isSharedTag(field: string): field is SharedTag {
  return Object.prototype.hasOwnProperty.call(TAG_VARIABLES, field);
}
