export const STYLE_CSS = `:root { color-scheme: dark; }
body { font-family: ui-sans-serif, system-ui, -apple-system, "Segoe UI", Roboto, Arial, sans-serif;
       margin: 0; background: #0b0f17; color: #e7eefc; }
a { color: #8ab4ff; }
.container { max-width: 980px; margin: 0 auto; padding: 24px; }
.card { background: rgba(255,255,255,0.06); border: 1px solid rgba(255,255,255,0.10);
        border-radius: 16px; padding: 16px 18px; margin: 14px 0; }
.kv { display: grid; grid-template-columns: 180px 1fr; gap: 10px; }
code, pre { background: rgba(0,0,0,0.35); border: 1px solid rgba(255,255,255,0.10); border-radius: 12px; }
code { padding: 1px 6px; word-break: break-all; }
pre { padding: 12px; overflow: auto; white-space: pre-wrap; word-break: break-word; }
.badge { display: inline-block; padding: 4px 10px; border-radius: 999px;
         background: rgba(138,180,255,0.18); border: 1px solid rgba(138,180,255,0.35); }
.badge.first { background: rgba(138,180,255,0.18); border-color: rgba(138,180,255,0.35); }
.badge.ok { background: rgba(80,200,120,0.18); border-color: rgba(80,200,120,0.35); }
.badge.changed { background: rgba(255,180,80,0.18); border-color: rgba(255,180,80,0.35); }
.badge.error { background: rgba(255,120,120,0.18); border-color: rgba(255,120,120,0.35); }
ins { background: rgba(80,200,120,0.30); text-decoration: none; }
del { background: rgba(255,120,120,0.30); }
.small { opacity: 0.85; font-size: 0.95rem; }
`;
