import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { getConfig } from "@/config/index";

const dbPath = path.resolve(process.cwd(), getConfig().SQLITE_DB_PATH);

console.log("🔧 Initializing SQLite database...");
console.log(`📁 Database path: ${dbPath}`);

fs.mkdirSync(path.dirname(dbPath), { recursive: true });
const db = new Database(dbPath);

// Physical layout of the "accidents" star schema; only the tables and
// columns the sample queries touch are created here
db.exec(`
  DROP TABLE IF EXISTS accidents_fact;
  DROP TABLE IF EXISTS accidents_dim0;
  DROP TABLE IF EXISTS accidents_dim1;
  DROP TABLE IF EXISTS accidents_dim2;

  CREATE TABLE accidents_fact (
    ID TEXT PRIMARY KEY,
    Start_Time TEXT,
    Airport_Code TEXT,
    p0 INTEGER,
    p1 INTEGER,
    p2 INTEGER
  );

  CREATE TABLE accidents_dim0 (
    p0 INTEGER PRIMARY KEY,
    Side TEXT,
    Country TEXT,
    Junction INTEGER
  );

  CREATE TABLE accidents_dim1 (
    p1 INTEGER PRIMARY KEY,
    Severity INTEGER,
    State TEXT,
    Timezone TEXT,
    Wind_Direction TEXT
  );

  CREATE TABLE accidents_dim2 (
    p2 INTEGER PRIMARY KEY,
    Weather_Condition TEXT,
    "Humidity(%)" REAL,
    "Visibility(mi)" REAL
  );
`);

const insertDim0 = db.prepare(
  "INSERT INTO accidents_dim0 (p0, Side, Country, Junction) VALUES (?, ?, ?, ?)"
);
const insertDim1 = db.prepare(
  "INSERT INTO accidents_dim1 (p1, Severity, State, Timezone, Wind_Direction) VALUES (?, ?, ?, ?, ?)"
);
const insertDim2 = db.prepare(
  'INSERT INTO accidents_dim2 (p2, Weather_Condition, "Humidity(%)", "Visibility(mi)") VALUES (?, ?, ?, ?)'
);
const insertFact = db.prepare(
  "INSERT INTO accidents_fact (ID, Start_Time, Airport_Code, p0, p1, p2) VALUES (?, ?, ?, ?, ?, ?)"
);

const seed = db.transaction(() => {
  insertDim0.run(1, "R", "US", 0);
  insertDim0.run(2, "L", "US", 1);
  insertDim1.run(1, 2, "OH", "US/Eastern", "SW");
  insertDim1.run(2, 3, "CA", "US/Pacific", "Calm");
  insertDim1.run(3, 4, "TX", "US/Central", "N");
  insertDim2.run(1, "Clear", 40, 10);
  insertDim2.run(2, "Light Rain", 91, 4);

  insertFact.run("A-1", "2016-02-08 05:46:00", "KCMH", 1, 1, 1);
  insertFact.run("A-2", "2016-02-08 06:07:59", "KLAX", 2, 2, 2);
  insertFact.run("A-3", "2016-02-08 06:49:27", "KDFW", 1, 3, 1);
  insertFact.run("A-4", "2016-02-08 07:23:34", "KCMH", 2, 1, 2);
});
seed();

console.log("✅ Star schema tables created and seeded");
console.log("📊 Tables: accidents_fact, accidents_dim0, accidents_dim1, accidents_dim2");

db.close();
console.log("🎉 Database initialization complete!");
