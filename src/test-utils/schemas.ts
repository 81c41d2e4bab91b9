export const CREATE_CLICKSTREAM_TABLE = `
CREATE TABLE IF NOT EXISTS clickstream (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    year INTEGER NOT NULL,
    month INTEGER NOT NULL,
    day INTEGER NOT NULL,
    order_sequence INTEGER NOT NULL,  -- click order within the session
    country TEXT NOT NULL,
    session_id INTEGER NOT NULL,
    page_1_main_category TEXT,        -- main product category
    page_2_clothing_model TEXT,       -- product code
    colour TEXT,
    location INTEGER,                 -- photo location on page (1-6)
    model_photography TEXT,
    price REAL,                       -- USD, 0 or NULL when unknown
    price_2 REAL,
    page TEXT,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_clickstream_session_id ON clickstream(session_id);
CREATE INDEX IF NOT EXISTS idx_clickstream_country ON clickstream(country);
CREATE INDEX IF NOT EXISTS idx_clickstream_date ON clickstream(year, month, day);
CREATE INDEX IF NOT EXISTS idx_clickstream_category ON clickstream(page_1_main_category);
CREATE INDEX IF NOT EXISTS idx_clickstream_product ON clickstream(page_2_clothing_model);
`;

export const CREATE_USER_SESSIONS_TABLE = `
CREATE TABLE IF NOT EXISTS user_sessions (
    session_id INTEGER PRIMARY KEY,
    country TEXT NOT NULL,
    start_date DATE NOT NULL,
    total_clicks INTEGER NOT NULL,
    unique_products_viewed INTEGER,
    unique_categories_viewed INTEGER,
    session_duration_minutes REAL,
    converted BOOLEAN DEFAULT FALSE,
    total_value REAL DEFAULT 0.0,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_user_sessions_country ON user_sessions(country);
CREATE INDEX IF NOT EXISTS idx_user_sessions_date ON user_sessions(start_date);
CREATE INDEX IF NOT EXISTS idx_user_sessions_converted ON user_sessions(converted);
`;

export const CREATE_PRODUCT_ANALYTICS_TABLE = `
CREATE TABLE IF NOT EXISTS product_analytics (
    product_code TEXT PRIMARY KEY,
    category TEXT,
    total_views INTEGER DEFAULT 0,
    unique_sessions INTEGER DEFAULT 0,
    countries_sold TEXT,              -- JSON array of countries
    avg_price REAL,
    conversion_rate REAL,
    last_updated TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_product_analytics_category ON product_analytics(category);
`;

export const CREATE_COUNTRY_ANALYTICS_TABLE = `
CREATE TABLE IF NOT EXISTS country_analytics (
    country TEXT PRIMARY KEY,
    total_sessions INTEGER DEFAULT 0,
    total_clicks INTEGER DEFAULT 0,
    avg_session_length REAL,
    conversion_rate REAL,
    popular_categories TEXT,          -- JSON array of top categories
    total_revenue REAL DEFAULT 0.0,
    last_updated TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

export const ALL_SCHEMAS = [
  CREATE_CLICKSTREAM_TABLE,
  CREATE_USER_SESSIONS_TABLE,
  CREATE_PRODUCT_ANALYTICS_TABLE,
  CREATE_COUNTRY_ANALYTICS_TABLE,
].join('\n');
