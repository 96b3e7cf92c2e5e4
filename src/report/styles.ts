export const REPORT_STYLES = `
        * { box-sizing: border-box; }
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
            max-width: 950px;
            margin: 0 auto;
            padding: 20px;
            background: #f5f5f5;
            color: #333;
        }
        .header { display: flex; align-items: center; gap: 12px; margin-bottom: 10px; }
        .logo { width: 40px; height: 40px; border-radius: 10px; background: #fff; box-shadow: 0 1px 3px rgba(0,0,0,0.1); }
        h1 { color: #1a365d; border-bottom: 3px solid #2563eb; padding-bottom: 10px; margin: 0; }
        .summary { background: #fff; padding: 15px 20px; border-radius: 8px; margin-bottom: 20px; box-shadow: 0 1px 3px rgba(0,0,0,0.1); }
        .summary strong { color: #2563eb; }
        .priority-section, .other-section { margin-bottom: 30px; }
        .priority-section h2, .other-section h2 { display: flex; align-items: center; gap: 8px; }
        .priority-section h2 { color: #dc2626; }
        .other-section h2 { color: #6b7280; }
        .priority-badge, .other-badge { color: white; padding: 2px 8px; border-radius: 999px; font-size: 12px; font-weight: 600; }
        .priority-badge { background: #dc2626; }
        .other-badge { background: #6b7280; }
        .filing { background: #fff; margin-bottom: 16px; border-radius: 8px; overflow: hidden; box-shadow: 0 1px 3px rgba(0,0,0,0.08); border-left: 4px solid #2563eb; }
        .filing.priority { border-left-color: #dc2626; }
        .filing-header { padding: 14px 16px; display: flex; justify-content: space-between; align-items: flex-start; gap: 12px; border-bottom: 1px solid #e5e7eb; }
        .company-info h3 { margin: 0 0 4px 0; color: #1a365d; font-size: 18px; }
        .ticker { display: inline-block; background: #2563eb; color: white; padding: 2px 8px; border-radius: 6px; font-weight: 700; font-size: 13px; }
        .cik { color: #6b7280; font-size: 12px; }
        .form-type { background: #e5e7eb; padding: 4px 10px; border-radius: 999px; font-size: 12px; font-weight: 700; white-space: nowrap; }
        .items { padding: 14px 16px; }
        .item { margin-bottom: 10px; padding: 10px 12px; background: #f9fafb; border-radius: 8px; border-left: 3px solid #e5e7eb; }
        .item.priority { border-left-color: #dc2626; background: #fef2f2; }
        .item-header { font-weight: 700; color: #1f2937; margin-bottom: 6px; }
        .item-context { color: #374151; font-size: 14px; line-height: 1.4; }
        .filing-link { display: block; padding: 12px 16px; background: #f3f4f6; text-decoration: none; color: #2563eb; font-weight: 700; border-top: 1px solid #e5e7eb; }
        .filing-link:hover { background: #e5e7eb; }
        .no-filings { text-align: center; color: #6b7280; padding: 30px; }
`;
