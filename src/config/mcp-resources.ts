/**
 * MCP Resource content documenting the archive data the tools return
 */

export const COLUMN_GUIDE = `# pscomppars Column Guide

Tools read the NASA Exoplanet Archive table **pscomppars** (Planetary Systems
Composite Parameters): one row per planet, combining the best available value
of each parameter across publications.

| Column | Meaning | Unit |
|---|---|---|
| \`pl_name\` | Planet name | |
| \`hostname\` | Host star name | |
| \`pl_masse\` | Planet mass (often a minimum mass, M·sin i) | Earth masses |
| \`pl_rade\` | Planet radius | Earth radii |
| \`pl_orbper\` | Orbital period | days |
| \`pl_orbsmax\` | Orbit semi-major axis | AU |
| \`pl_eqt\` | Equilibrium temperature | K |
| \`sy_dist\` | Distance to the system | parsecs (1 pc ≈ 3.26 light years) |
| \`discoverymethod\` | Discovery method | |
| \`disc_year\` | Discovery year | |
| \`disc_locale\` | Ground, Space or Multiple | |
| \`disc_facility\` | Discovery facility | |
| \`disc_telescope\` | Discovery telescope | |
| \`disc_instrument\` | Discovery instrument | |
| \`disc_refname\` | Discovery reference | |
| \`disc_pubdate\` | Discovery publication date | YYYY-MM |

## Reading the numbers

- 1 Jupiter mass ≈ 318 Earth masses; 1 Jupiter radius ≈ 11.2 Earth radii.
- Many columns are null. Radial-velocity planets usually lack a radius and
  transiting planets often lack a mass, so calculators that need both report
  those planets under \`failures\`.

## Response envelope

\`\`\`json
{ "status": "success", "count": 2, "data": [ ... ], "failures": [ ... ] }
{ "status": "empty", "count": 0, "data": [], "message": "..." }
{ "status": "error", "errorType": "service_timeout", "message": "..." }
\`\`\`

\`errorType\` is one of \`validation\`, \`service_timeout\`, \`service_unreachable\`,
\`service_rejected\`, \`service_malformed_response\`, \`missing_data\`, \`not_found\`
or \`unknown\`. Nothing is retried: call again to retry.
`;
