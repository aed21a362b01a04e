export const SCHEMA = `
-- Operational tables

CREATE TABLE IF NOT EXISTS productions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  greenhouse TEXT NOT NULL,
  crop TEXT NOT NULL,
  planting_date TEXT NOT NULL,
  harvest_date TEXT,
  status TEXT NOT NULL DEFAULT 'Ekim Yapıldı'
    CHECK (status IN ('Ekim Yapıldı', 'Büyüme Döneminde', 'Çiçeklenme', 'Hasat Edildi')),
  area REAL,
  expected_yield REAL,
  actual_yield REAL,
  notes TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  CHECK (harvest_date IS NULL OR harvest_date >= planting_date)
);

CREATE TABLE IF NOT EXISTS personnel (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  position TEXT,
  monthly_salary REAL NOT NULL DEFAULT 0 CHECK (monthly_salary >= 0),
  start_date TEXT,
  active INTEGER NOT NULL DEFAULT 1,
  phone TEXT,
  notes TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS harvests (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  production_id INTEGER REFERENCES productions (id) ON DELETE SET NULL,
  harvest_date TEXT NOT NULL,
  plot TEXT NOT NULL,
  quantity REAL NOT NULL CHECK (quantity >= 0),
  personnel_id INTEGER NOT NULL REFERENCES personnel (id),
  delivered_to TEXT,
  notes TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS harvests_date_idx ON harvests (harvest_date);

CREATE TABLE IF NOT EXISTS inventory_items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  category TEXT,
  quantity REAL NOT NULL CHECK (quantity >= 0),
  unit TEXT,
  date TEXT NOT NULL,
  warehouse TEXT,
  min_stock REAL NOT NULL DEFAULT 0 CHECK (min_stock >= 0),
  unit_cost REAL NOT NULL DEFAULT 0 CHECK (unit_cost >= 0),
  notes TEXT NOT NULL DEFAULT ''
);

CREATE TABLE IF NOT EXISTS attendance (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  personnel_id INTEGER NOT NULL REFERENCES personnel (id),
  date TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('Geldi', 'Gelmedi', 'İzinli', 'Rapor')),
  check_in TEXT,
  check_out TEXT,
  notes TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (personnel_id, date)
);

CREATE TABLE IF NOT EXISTS tasks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  personnel_id INTEGER NOT NULL REFERENCES personnel (id),
  description TEXT NOT NULL,
  date TEXT NOT NULL,
  greenhouse TEXT,
  completed INTEGER NOT NULL DEFAULT 1,
  notes TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

-- Users and sessions

CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL UNIQUE,
  email TEXT UNIQUE,
  password_hash TEXT NOT NULL,
  full_name TEXT,
  role TEXT NOT NULL DEFAULT 'kullanici' CHECK (role IN ('admin', 'kullanici')),
  active INTEGER NOT NULL DEFAULT 1,
  last_login_at TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS login_attempts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL,
  ip TEXT,
  success INTEGER NOT NULL DEFAULT 0,
  attempted_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sessions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES users (id) ON DELETE CASCADE,
  token_hash TEXT,
  user_agent TEXT,
  created_at TEXT NOT NULL,
  expires_at TEXT NOT NULL,
  revoked_at TEXT
);
`;
