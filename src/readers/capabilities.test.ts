import { describe, it, expect } from 'vitest';
import { parseCapabilities, parseTimeDimension } from './capabilities.js';

const WMS_130 = `<?xml version="1.0" encoding="UTF-8"?>
<WMS_Capabilities version="1.3.0" xmlns="http://www.opengis.net/wms">
  <Service>
    <Name>WMS</Name>
    <Title>Ortofotomapa</Title>
  </Service>
  <Capability>
    <Layer>
      <Title>Root</Title>
      <EX_GeographicBoundingBox>
        <westBoundLongitude>14.0</westBoundLongitude>
        <eastBoundLongitude>24.2</eastBoundLongitude>
        <southBoundLatitude>49</southBoundLatitude>
        <northBoundLatitude>55</northBoundLatitude>
      </EX_GeographicBoundingBox>
      <Dimension name="time" units="ISO8601">2020-01-01/2021-12-31/P1Y</Dimension>
      <Layer>
        <Name>Raster</Name>
        <Title>Raster layer</Title>
      </Layer>
      <Layer>
        <Name>Sheets</Name>
        <EX_GeographicBoundingBox>
          <westBoundLongitude>19</westBoundLongitude>
          <eastBoundLongitude>20</eastBoundLongitude>
          <southBoundLatitude>50</southBoundLatitude>
          <northBoundLatitude>51</northBoundLatitude>
        </EX_GeographicBoundingBox>
      </Layer>
    </Layer>
  </Capability>
</WMS_Capabilities>`;

const WMS_111 = `<?xml version="1.0" encoding="UTF-8"?>
<WMT_MS_Capabilities version="1.1.1">
  <Service>
    <Title>Granice</Title>
  </Service>
  <Capability>
    <Layer>
      <Name>boundaries</Name>
      <LatLonBoundingBox minx="14.1" miny="49.0" maxx="24.1" maxy="54.8"/>
    </Layer>
  </Capability>
</WMT_MS_Capabilities>`;

const WMTS = `<?xml version="1.0" encoding="UTF-8"?>
<Capabilities version="1.0.0" xmlns="http://www.opengis.net/wmts/1.0" xmlns:ows="http://www.opengis.net/ows/1.1">
  <ows:ServiceIdentification>
    <ows:Title>Mapa topograficzna</ows:Title>
  </ows:ServiceIdentification>
  <Contents>
    <Layer>
      <ows:Title>Topo</ows:Title>
      <ows:WGS84BoundingBox>
        <ows:LowerCorner>14.1 49.0</ows:LowerCorner>
        <ows:UpperCorner>24.1 54.8</ows:UpperCorner>
      </ows:WGS84BoundingBox>
      <ows:Identifier>topo</ows:Identifier>
      <Dimension>
        <ows:Identifier>time</ows:Identifier>
        <Value>2019-06-01</Value>
        <Value>2018-06-01</Value>
      </Dimension>
    </Layer>
    <Layer>
      <ows:Title>Unnamed</ows:Title>
    </Layer>
  </Contents>
</Capabilities>`;

describe('Capabilities reader', () => {
  describe('parseTimeDimension', () => {
    it('should cover instants and intervals', () => {
      expect(parseTimeDimension('2021-03-01, 2019-01-01/2020-01-01/P1M')).toEqual({
        start: '2019-01-01T00:00:00.000Z',
        end: '2021-03-01T00:00:00.000Z',
      });
    });

    it('should return undefined when nothing is a date', () => {
      expect(parseTimeDimension('current')).toBeUndefined();
      expect(parseTimeDimension(undefined)).toBeUndefined();
    });
  });

  it('should read WMS 1.3.0 layers with inherited box and time', () => {
    expect(parseCapabilities(WMS_130)).toEqual({
      service: 'WMS',
      version: '1.3.0',
      title: 'Ortofotomapa',
      layers: [
        {
          name: 'Raster',
          title: 'Raster layer',
          bbox: { xmin: 14, ymin: 49, xmax: 24.2, ymax: 55 },
          temporal: { start: '2020-01-01T00:00:00.000Z', end: '2021-12-31T00:00:00.000Z' },
        },
        {
          name: 'Sheets',
          bbox: { xmin: 19, ymin: 50, xmax: 20, ymax: 51 },
          temporal: { start: '2020-01-01T00:00:00.000Z', end: '2021-12-31T00:00:00.000Z' },
        },
      ],
    });
  });

  it('should read WMS 1.1.1 lat/lon boxes', () => {
    expect(parseCapabilities(WMS_111)).toEqual({
      service: 'WMS',
      version: '1.1.1',
      title: 'Granice',
      layers: [{ name: 'boundaries', bbox: { xmin: 14.1, ymin: 49, xmax: 24.1, ymax: 54.8 } }],
    });
  });

  it('should read WMTS layers and skip those without an identifier', () => {
    expect(parseCapabilities(WMTS)).toEqual({
      service: 'WMTS',
      version: '1.0.0',
      title: 'Mapa topograficzna',
      layers: [
        {
          name: 'topo',
          title: 'Topo',
          bbox: { xmin: 14.1, ymin: 49, xmax: 24.1, ymax: 54.8 },
          temporal: { start: '2018-06-01T00:00:00.000Z', end: '2019-06-01T00:00:00.000Z' },
        },
      ],
    });
  });

  it('should reject documents that are not capabilities', () => {
    expect(() => parseCapabilities('<metadata/>')).toThrow('Not a capabilities document: root element is metadata');
  });
});
