import type { DatabaseClient } from "./types.js";

const schemaSql = `
CREATE TABLE IF NOT EXISTS contact (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  phone_number TEXT NOT NULL,
  UNIQUE (name, phone_number)
);

CREATE TABLE IF NOT EXISTS conversation (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  type TEXT NOT NULL,
  timestamp TEXT,
  duration TEXT NOT NULL DEFAULT '',
  transcript TEXT NOT NULL DEFAULT '',
  source_file TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS participant (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  conversation_id INTEGER NOT NULL,
  contact_id INTEGER NOT NULL,
  UNIQUE (conversation_id, contact_id),
  FOREIGN KEY (conversation_id) REFERENCES conversation(id),
  FOREIGN KEY (contact_id) REFERENCES contact(id)
);

CREATE TABLE IF NOT EXISTS message (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  conversation_id INTEGER NOT NULL,
  timestamp TEXT,
  sender_contact_id INTEGER NOT NULL,
  content TEXT NOT NULL,
  FOREIGN KEY (conversation_id) REFERENCES conversation(id),
  FOREIGN KEY (sender_contact_id) REFERENCES contact(id)
);

CREATE TABLE IF NOT EXISTS image (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  message_id INTEGER NOT NULL,
  image_url TEXT NOT NULL,
  FOREIGN KEY (message_id) REFERENCES message(id)
);

CREATE TABLE IF NOT EXISTS media_file (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  image_id INTEGER NOT NULL,
  file_name TEXT NOT NULL,
  content BLOB NOT NULL,
  FOREIGN KEY (image_id) REFERENCES image(id)
);

CREATE TABLE IF NOT EXISTS import_run (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  directory TEXT NOT NULL,
  started_at TEXT NOT NULL,
  finished_at TEXT,
  extracted_count INTEGER NOT NULL DEFAULT 0,
  failed_count INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS parse_warning (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  import_id INTEGER NOT NULL,
  source_file TEXT NOT NULL,
  severity TEXT NOT NULL,
  code TEXT NOT NULL,
  details_json TEXT NOT NULL,
  created_at TEXT NOT NULL,
  FOREIGN KEY (import_id) REFERENCES import_run(id)
);

CREATE INDEX IF NOT EXISTS idx_conversation_timestamp ON conversation(timestamp);
CREATE INDEX IF NOT EXISTS idx_participant_conversation ON participant(conversation_id);
CREATE INDEX IF NOT EXISTS idx_message_conversation ON message(conversation_id);
CREATE INDEX IF NOT EXISTS idx_image_message ON image(message_id);
CREATE INDEX IF NOT EXISTS idx_parse_warning_import ON parse_warning(import_id);
`;

export function migrate(db: DatabaseClient): void {
  db.exec(schemaSql);
}
