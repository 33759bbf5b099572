import { useMemo, useState } from 'react';
import { useNavigate } from 'react-router-dom';
import { useAuth } from '../contexts/AuthContext';
import { displayName, useAppState } from '../store';

interface ProjectForm {
  name: string;
  description: string;
  memberIds: string[];
}

const EMPTY_FORM: ProjectForm = { name: '', description: '', memberIds: [] };

export function Dashboard() {
  const { state, methods, loading, error } = useAppState();
  const { user } = useAuth();
  const [showProjectForm, setShowProjectForm] = useState(false);
  const [projectForm, setProjectForm] = useState(EMPTY_FORM);
  const [formError, setFormError] = useState('');
  const [searchQuery, setSearchQuery] = useState('');
  const navigate = useNavigate();
  const isScrumMaster = user?.role === 'scrum_master';

  const filteredProjects = useMemo(() => {
    const query = searchQuery.trim().toLowerCase();
    if (!query) return state.projects;
    return state.projects.filter(
      p => p.name.toLowerCase().includes(query) || p.description.toLowerCase().includes(query)
    );
  }, [state.projects, searchQuery]);

  const stats = useMemo(() => {
    const active = state.projects.filter(p => p.is_active).length;
    const totalTasks = state.projects.reduce((sum, p) => sum + p.task_count, 0);
    return { total: state.projects.length, active, totalTasks };
  }, [state.projects]);

  function toggleMember(id: string) {
    setProjectForm(prev => ({
      ...prev,
      memberIds: prev.memberIds.includes(id) ? prev.memberIds.filter(m => m !== id) : [...prev.memberIds, id]
    }));
  }

  async function handleCreateProject(e: React.FormEvent) {
    e.preventDefault();
    const name = projectForm.name.trim();
    if (!name) return;
    setFormError('');
    try {
      const project = await methods.createProject({
        name,
        description: projectForm.description.trim(),
        member_ids: projectForm.memberIds
      });
      setProjectForm(EMPTY_FORM);
      setShowProjectForm(false);
      navigate(`/projects/${project.id}`);
    } catch (err) {
      console.error('Failed to create project:', err);
      setFormError(err instanceof Error ? err.message : 'Failed to create project');
    }
  }

  async function handleDeleteProject(id: string, name: string) {
    if (!confirm(`Delete project "${name}" and all of its tasks?`)) return;
    try {
      await methods.deleteProject(id);
    } catch (err) {
      console.error('Failed to delete project:', err);
      alert('Failed to delete project. Please try again.');
    }
  }

  return (
    <div className="container" style={{ display: 'grid', gap: 16 }}>
      {error && (
        <div className="card" style={{ borderColor: '#ef4444', color: '#ef4444' }}>
          {error}
        </div>
      )}

      <div className="grid grid-3">
        <div className="stat-card">
          <div className="stat-value">{stats.total}</div>
          <div className="stat-label">Projects</div>
        </div>
        <div className="stat-card">
          <div className="stat-value">{stats.active}</div>
          <div className="stat-label">Active</div>
        </div>
        <div className="stat-card">
          <div className="stat-value">{stats.totalTasks}</div>
          <div className="stat-label">Tasks</div>
        </div>
      </div>

      <div className="card" style={{ display: 'grid', gap: 12 }}>
        <div className="space-between">
          <div className="title">Projects</div>
          {isScrumMaster && (
            <button className="btn primary" onClick={() => setShowProjectForm(v => !v)}>
              {showProjectForm ? 'Cancel' : 'New project'}
            </button>
          )}
        </div>

        {showProjectForm && (
          <form onSubmit={handleCreateProject} style={{ display: 'grid', gap: 8 }}>
            {formError && <div style={{ color: '#ef4444', fontSize: 14 }}>{formError}</div>}
            <input
              className="input"
              placeholder="Project name"
              value={projectForm.name}
              onChange={e => setProjectForm(prev => ({ ...prev, name: e.target.value }))}
              required
            />
            <textarea
              className="input"
              placeholder="Description"
              rows={3}
              value={projectForm.description}
              onChange={e => setProjectForm(prev => ({ ...prev, description: e.target.value }))}
            />
            <div className="muted" style={{ fontSize: 12 }}>
              Members
            </div>
            <div className="row" style={{ gap: 12, flexWrap: 'wrap' }}>
              {state.users.map(member => (
                <label key={member.id} className="row" style={{ gap: 4, fontSize: 13 }}>
                  <input
                    type="checkbox"
                    checked={projectForm.memberIds.includes(member.id)}
                    onChange={() => toggleMember(member.id)}
                  />
                  {displayName(member)}
                </label>
              ))}
            </div>
            <button className="btn primary" type="submit" disabled={loading || !projectForm.name.trim()}>
              Create project
            </button>
          </form>
        )}

        <input
          className="input"
          placeholder="Search projects..."
          value={searchQuery}
          onChange={e => setSearchQuery(e.target.value)}
        />

        {filteredProjects.length === 0 ? (
          <div className="muted">
            {state.projects.length === 0 ? 'No projects yet.' : 'No projects match your search.'}
          </div>
        ) : (
          <div className="grid grid-3">
            {filteredProjects.map(project => (
              <div
                key={project.id}
                className="card"
                style={{ display: 'grid', gap: 8, cursor: 'pointer' }}
                onClick={() => navigate(`/projects/${project.id}`)}
              >
                <div className="space-between">
                  <div style={{ fontWeight: 700 }}>{project.name}</div>
                  {!project.is_active && <span className="muted" style={{ fontSize: 11 }}>Archived</span>}
                </div>
                {project.description && (
                  <div className="muted" style={{ fontSize: 13 }}>
                    {project.description}
                  </div>
                )}
                <div className="space-between muted" style={{ fontSize: 12 }}>
                  <span>{project.task_count} tasks</span>
                  <span>{project.members.length} members</span>
                </div>
                {isScrumMaster && (
                  <button
                    className="btn danger"
                    style={{ fontSize: 12 }}
                    onClick={e => {
                      e.stopPropagation();
                      void handleDeleteProject(project.id, project.name);
                    }}
                  >
                    Delete
                  </button>
                )}
              </div>
            ))}
          </div>
        )}
      </div>
    </div>
  );
}
