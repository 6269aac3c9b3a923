// Scraped by existing dashboards; keep byte for byte.
export const STATIC_METRICS = `# HELP app_requests_total Total application requests
# TYPE app_requests_total counter
app_requests_total{method="GET",path="/health"} 100
app_requests_total{method="GET",path="/ready"} 50
app_requests_total{method="GET",path="/api/v1/status"} 30

# HELP app_request_duration_seconds Request latency
# TYPE app_request_duration_seconds histogram
app_request_duration_seconds_bucket{le="0.1"} 95
app_request_duration_seconds_bucket{le="0.5"} 98
app_request_duration_seconds_bucket{le="1.0"} 100

# HELP app_info Application info
# TYPE app_info gauge
app_info{app="kubernetes-platform-stack",version="1.0.0",environment="unknown"} 1
`;
