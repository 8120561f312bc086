/**
 * Shared types for the worldtalk packages.
 *
 * Statements and requests are structured records. They refer to concrete
 * entities by id, so they can be compared structurally, journalled and
 * replayed without holding references into a live world.
 */

// ─── World Vocabulary ───────────────────────────────────────────────

export type Preposition = "in" | "on" | "under";

export const LOCATION_POSITIONS: readonly Preposition[] = ["in", "on", "under"];

export interface LocationValue {
  position: Preposition;
  holder: string;
}

/** A property value as it appears in statements: plain text, an entity id, or a location. */
export type PropertyValue = string | LocationValue;

export interface AbstractItem {
  abstract: true;
  properties: Record<string, string>;
  attributes: string[];
}

/** Either the id of a concrete entity or an abstract description ("a red ball"). */
export type ItemRef = string | AbstractItem;

export type GoalValue = 1 | 0 | -1;

/** Three-valued answer of the knowledge base. `undefined` means not yet observed. */
export type Trinary = boolean | undefined;

// ─── Requests ───────────────────────────────────────────────────────

export interface GoDirectionRequest {
  kind: "go-direction";
  agent: string;
  direction: string;
}

export interface GoLocationRequest {
  kind: "go-location";
  agent: string;
  item: ItemRef;
}

export interface GetRequest {
  kind: "get";
  agent: string;
  item: ItemRef;
  location?: LocationValue;
}

export interface DropRequest {
  kind: "drop";
  agent: string;
  item: ItemRef;
  location: LocationValue;
}

export interface LookRequest {
  kind: "look";
  agent: string;
  item: ItemRef;
  position: Preposition | "at";
  location?: LocationValue;
}

export interface OpenCloseRequest {
  kind: "open" | "close";
  agent: string;
  item: ItemRef;
  location?: LocationValue;
}

export interface ChangeRequest {
  kind: "change";
  agent: string;
  item: ItemRef;
  key: string;
  value: string;
}

export interface IsPropertyRequest {
  kind: "is-property";
  agent: string;
  item: ItemRef;
  key: string;
  value: string;
}

export interface IsAttributeRequest {
  kind: "is-attribute";
  agent: string;
  item: ItemRef;
  attribute: string;
}

export type PrimitiveRequest =
  | GoDirectionRequest
  | GoLocationRequest
  | GetRequest
  | DropRequest
  | LookRequest
  | OpenCloseRequest
  | ChangeRequest
  | IsPropertyRequest
  | IsAttributeRequest;

export interface AndRequest {
  kind: "and";
  parts: PrimitiveRequest[];
}

export type Request = PrimitiveRequest | AndRequest;

// ─── Statements ─────────────────────────────────────────────────────

/** "X's key is (not) value", including location, exits, obstacles and door_to. */
export interface PropertyStatement {
  kind: "property";
  subject: string;
  key: string;
  value: PropertyValue;
  negated: boolean;
}

/** "X is (not) attribute" */
export interface AttributeStatement {
  kind: "attribute";
  subject: string;
  attribute: string;
  negated: boolean;
}

/** "holder has (not) A, B position it"; negated with no items means "has no items". */
export interface ContentsStatement {
  kind: "contents";
  holder: string;
  position: Preposition;
  items: string[];
  negated: boolean;
}

/** "P goes north from X"; `from` is absent in an agent's "tries going north". */
export interface GoStatement {
  kind: "go";
  actor: string;
  direction: string;
  from?: string;
}

export interface GetStatement {
  kind: "get";
  actor: string;
  item: string;
  from?: LocationValue;
}

export interface DropStatement {
  kind: "drop";
  actor: string;
  item: string;
  to: LocationValue;
}

export interface OpenStatement {
  kind: "open" | "close";
  actor: string;
  item: string;
}

export interface ChangeStatement {
  kind: "change";
  actor: string;
  item: string;
  key: string;
  value: string;
}

export interface LookStatement {
  kind: "look";
  actor: string;
  position: Preposition | "at";
  target: string;
}

/** "P sees A, B" at a location. */
export interface SeesStatement {
  kind: "sees";
  actor: string;
  items: string[];
  location: LocationValue;
}

export type PermissionRule =
  | { rule: "get-players" }
  | { rule: "change-key"; key: string }
  | { rule: "change-held"; key: string }
  | { rule: "drop-into-itself" };

export interface PermissionStatement {
  kind: "permission";
  permission: PermissionRule;
  negated: boolean;
}

/** "value is (not) a key", e.g. "red is a color". */
export interface ValidValueStatement {
  kind: "valid-value";
  key: string;
  value: string;
  negated: boolean;
}

/** "X has (no) element", e.g. "the barn has no north exit". */
export interface ElementExistsStatement {
  kind: "element-exists";
  subject: string;
  element: string;
  negated: boolean;
}

export interface NotRevealedStatement {
  kind: "not-revealed";
  what: "location" | "path";
  subject: string;
  target?: string;
}

export interface NoPathStatement {
  kind: "no-path";
  from: string;
  to: string;
}

/** "The change from X's key to value is conflicting with Y." */
export interface ConflictStatement {
  kind: "conflict";
  subject: string;
  key: string;
  value: string;
  with: string;
}

export interface MovedStatement {
  kind: "moved";
  actor: string;
  direction: string;
  from: string;
}

export interface NothingSpecialStatement {
  kind: "nothing-special";
  subject: string;
}

export type ActionStatement =
  | GoStatement
  | GetStatement
  | DropStatement
  | OpenStatement
  | ChangeStatement
  | LookStatement;

/** An attempt that cannot be done, with the reasons it is blocked. */
export interface CannotStatement {
  kind: "cannot";
  actor: string;
  attempt: Attempt;
  reasons: Statement[];
}

export interface GoToAttempt {
  kind: "go-to";
  target: ItemRef;
}

/** An attempt on an abstract item, e.g. "can not get a red ball". */
export interface AbstractAttempt {
  kind: "abstract";
  verb: "get" | "drop" | "look" | "open" | "close" | "change";
  item: AbstractItem;
}

export type Attempt = ActionStatement | GoToAttempt | AbstractAttempt;

export interface CompoundStatement {
  kind: "compound";
  parts: Statement[];
}

export interface SayStatement {
  kind: "say";
  speaker: string;
  content: Statement;
}

export interface TriesStatement {
  kind: "tries";
  actor: string;
  attempt: ActionStatement;
}

export interface RequestStatement {
  kind: "request";
  request: Request;
}

/** "I don't know whether ..." about an unanswered question. */
export interface DontKnowStatement {
  kind: "dont-know";
  question?: IsPropertyRequest | IsAttributeRequest;
}

/** "There is not a <item> with <key> <value>" or "... that is <attribute>". */
export interface NoMatchStatement {
  kind: "no-match";
  item: AbstractItem;
  key?: string;
  value?: string;
  attribute?: string;
}

export interface UnrecognizedStatement {
  kind: "unrecognized";
  actor: string;
}

export interface MoreComingStatement {
  kind: "more-coming";
}

export interface EmptyStatement {
  kind: "empty";
}

export type Statement =
  | PropertyStatement
  | AttributeStatement
  | ContentsStatement
  | GoStatement
  | GetStatement
  | DropStatement
  | OpenStatement
  | ChangeStatement
  | LookStatement
  | SeesStatement
  | PermissionStatement
  | ValidValueStatement
  | ElementExistsStatement
  | NotRevealedStatement
  | NoPathStatement
  | ConflictStatement
  | MovedStatement
  | NothingSpecialStatement
  | CannotStatement
  | CompoundStatement
  | SayStatement
  | TriesStatement
  | RequestStatement
  | DontKnowStatement
  | NoMatchStatement
  | UnrecognizedStatement
  | MoreComingStatement
  | EmptyStatement;

export type StatementKind = Statement["kind"];

// ─── Utterances ─────────────────────────────────────────────────────

/** One committed entry of the dialogue history. A null speaker is the environment. */
export interface Utterance {
  speaker: string | null;
  statement: Statement;
  trusted: boolean;
}

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ─── World Layouts ──────────────────────────────────────────────────

export interface LayoutEntity {
  id: string;
  kind?: "entity" | "player" | "place" | "door" | "table" | "bed" | "window" | "book";
  properties?: Record<string, string>;
  attributes?: string[];
  location?: { position: Preposition; holder: string };
  exits?: Record<string, string>;
  obstacles?: Record<string, string>;
  door_to?: string;
}

export interface WorldLayout {
  name: string;
  entities: LayoutEntity[];
  /** Extra vocabulary values not held by any entity, keyed by property. */
  vocabulary?: Record<string, string[]>;
  /** Extra player names, nicknames and surnames for the change action. */
  player_vocabulary?: Record<string, string[]>;
}

// ─── Transcript Events ──────────────────────────────────────────────

export type TranscriptEventType =
  | "dialogue.started"
  | "utterance.added"
  | "policy.failed"
  | "dialogue.finished"
  | "batch.summary";

export interface TranscriptEvent {
  event_id: string;
  timestamp: string;
  dialogue_id: string;
  type: TranscriptEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}
