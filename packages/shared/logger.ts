import fs from 'fs';
import path from 'path';

const LOG_DIR = process.env.INSIGHT_LOG_DIR || 'logs';
const LOG_FILE = path.join(LOG_DIR, 'debug.log');

const formatTimestamp = (now: Date) => {
    const timestamp = now.toLocaleTimeString();
    const milliseconds = now.getMilliseconds().toString().padStart(3, '0');
    return `${timestamp}.${milliseconds}`;
};

let initialized = false;

// Roll the previous session's log aside, then start a fresh file.
const initLogFile = () => {
    initialized = true;
    fs.mkdirSync(LOG_DIR, { recursive: true });
    if (fs.existsSync(LOG_FILE)) {
        const d = fs.statSync(LOG_FILE).mtime;
        const y = d.getFullYear();
        const mm = String(d.getMonth() + 1).padStart(2, '0');
        const dd = String(d.getDate()).padStart(2, '0');
        const hh = String(d.getHours()).padStart(2, '0');
        const mi = String(d.getMinutes()).padStart(2, '0');
        const ss = String(d.getSeconds()).padStart(2, '0');
        fs.copyFileSync(LOG_FILE, path.join(LOG_DIR, `debug.${y}${mm}${dd}_${hh}${mi}${ss}.log`));
    }
    fs.writeFileSync(LOG_FILE, `[${formatTimestamp(new Date())}] --- Application Started ---\n`);
};

export const addLog = (message: string) => {
    if (!initialized) {
        initLogFile();
    }
    fs.appendFileSync(LOG_FILE, `[${formatTimestamp(new Date())}] ${message}\n`);
};

export const getLogDir = () => LOG_DIR;
