/**
 * Map HTML Template
 *
 * Self-contained Leaflet page. Map data is embedded as a global `mapData`
 * object; the app script draws markers, labels and the legend from it.
 */

import { encode } from 'html-entities'
import type { MapLegend } from './types'

const LEAFLET_VERSION = '1.9.4'

export const MAP_STYLES = `
  html, body { height: 100%; margin: 0; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; }
  #map { width: 100%; height: 100%; }
  .pin-marker { border-radius: 50% 50% 50% 0; transform: rotate(-45deg); border: 2px solid white; box-shadow: 0 1px 3px rgba(0,0,0,0.4); }
  .pin-marker span { display: block; transform: rotate(45deg); text-align: center; color: white; font-size: 12px; line-height: 22px; }
  .magnitude-label { font-size: 11px; font-weight: 600; color: #222; text-align: center; text-shadow: 0 0 3px white, 0 0 3px white; white-space: nowrap; }
  .legend { position: fixed; bottom: 30px; right: 10px; z-index: 1000; background: white; padding: 10px 12px; border-radius: 6px; box-shadow: 0 1px 5px rgba(0,0,0,0.3); font-size: 12px; line-height: 18px; }
  .legend h4 { margin: 0 0 6px; font-size: 13px; }
  .legend-item { display: flex; align-items: center; gap: 6px; }
  .legend-swatch { width: 14px; height: 14px; border-radius: 50%; border: 1px solid #555; }
`

export const APP_JS = `
(function () {
  var map = L.map('map').setView([mapData.center.lat, mapData.center.lng], mapData.zoom);
  L.tileLayer('https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png', {
    maxZoom: 19,
    attribution: '&copy; OpenStreetMap contributors'
  }).addTo(map);

  var icons = { home: '&#8962;' };

  mapData.markers.forEach(function (m) {
    if (m.kind === 'pin') {
      L.marker([m.lat, m.lng], {
        icon: L.divIcon({
          className: '',
          html: '<div class="pin-marker" style="background-color: ' + m.color + '; width: 24px; height: 24px;"><span>' + (icons[m.icon] || '') + '</span></div>',
          iconSize: [24, 24],
          iconAnchor: [12, 24],
          popupAnchor: [0, -24]
        })
      })
        .bindTooltip(m.tooltipHtml)
        .bindPopup(m.popupHtml, { maxWidth: 300 })
        .addTo(map);
      return;
    }

    L.circleMarker([m.lat, m.lng], {
      radius: m.radius,
      fillColor: m.fillColor,
      color: '#333333',
      weight: 1,
      fillOpacity: 0.7
    })
      .bindTooltip(m.tooltipHtml)
      .bindPopup(m.popupHtml, { maxWidth: 300 })
      .addTo(map);

    L.marker([m.lat, m.lng], {
      interactive: false,
      icon: L.divIcon({
        className: 'magnitude-label',
        html: m.label,
        iconSize: [48, 14],
        iconAnchor: [24, 7]
      })
    }).addTo(map);
  });
})();
`

const HTML_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>{{TITLE}}</title>
  <link rel="stylesheet" href="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css" />
  <script src="https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js"></script>
  <style>{{STYLES}}</style>
</head>
<body>
  <div id="map"></div>
{{LEGEND}}
  <script>{{DATA}}</script>
  <script>{{APP}}</script>
</body>
</html>
`

/**
 * Render the fixed-position legend for magnitude maps.
 */
export function generateLegendHTML(legend: MapLegend): string {
  const items = [...legend.entries]
    .reverse()
    .map(
      (entry) =>
        `    <div class="legend-item"><span class="legend-swatch" style="background-color: ${entry.color};"></span>${encode(entry.range)}</div>`
    )
    .join('\n')

  return [
    '  <div class="legend">',
    `    <h4>${encode(legend.title)}</h4>`,
    `    <div>Min: ${legend.min.toLocaleString('en-US')} · Max: ${legend.max.toLocaleString('en-US')}</div>`,
    items,
    '  </div>'
  ].join('\n')
}

/**
 * Generate the HTML document.
 */
export function generateMapHTML(parts: {
  title: string
  data: string
  legend: MapLegend | null
}): string {
  // Function replacers: `$` sequences in the inserted text stay literal
  return HTML_TEMPLATE.replace('{{TITLE}}', () => encode(parts.title))
    .replace('{{STYLES}}', () => MAP_STYLES)
    .replace('{{LEGEND}}', () => (parts.legend ? generateLegendHTML(parts.legend) : ''))
    .replace('{{DATA}}', () => parts.data)
    .replace('{{APP}}', () => APP_JS)
}
