import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { createBrowserRouter, RouterProvider, useParams, useSearchParams } from 'react-router-dom'
import './index.css'
import App from './App.tsx'
import { LandingPage } from './components/LandingPage.tsx'
import { buildReference } from './lib/reference'

// /:owner/:repo/pull/:prNumber[/commits/:sha] and /:owner/:repo/commit/:sha
function RouteReview() {
  const params = useParams();
  const reference = buildReference(params);
  return <App key={reference} reference={reference} />;
}

// /review?ref=<anything the server accepts>
function QueryReview() {
  const [searchParams] = useSearchParams();
  const reference = searchParams.get('ref');
  return <App key={reference} reference={reference} />;
}

const router = createBrowserRouter([
  {
    path: "/",
    element: <LandingPage />,
  },
  {
    path: "/review",
    element: <QueryReview />,
  },
  {
    path: "/:owner/:repo/pull/:prNumber",
    element: <RouteReview />,
  },
  {
    path: "/:owner/:repo/pull/:prNumber/commits/:sha",
    element: <RouteReview />,
  },
  {
    path: "/:owner/:repo/commit/:sha",
    element: <RouteReview />,
  },
])

const root = document.getElementById('root')
if (!root) {
  throw new Error('Missing #root element')
}

createRoot(root).render(
  <StrictMode>
    <RouterProvider router={router} />
  </StrictMode>,
)
